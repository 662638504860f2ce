/**
 * ProcessRunner - запуск внешней утилиты с таймаутом и отменой
 */

import * as cp from 'child_process';
import { ExecuteError } from './errors';
import type { ExecutionResult, ToolInvocation } from './models/lintingError';

/**
 * Состояние дочернего процесса. Из spawned/running выходим ровно один раз.
 */
export type ProcessState = 'spawned' | 'running' | 'completed' | 'timedOut' | 'cancelled' | 'failed';

/** Больше setTimeout не принимает: срабатывает сразу */
export const MAX_TIMEOUT_MS = 2147483647;

export function clampTimeout(timeoutMs: number): number {
    return Math.min(Math.max(timeoutMs, 1), MAX_TIMEOUT_MS);
}

export interface CommandRunner {
    execute(invocation: ToolInvocation, signal?: AbortSignal): Promise<ExecutionResult>;
}

export class ProcessRunner implements CommandRunner {

    /**
     * Запустить процесс и дождаться его завершения, таймаута или отмены.
     * Во всех случаях, кроме обычного выхода, процесс принудительно завершается.
     */
    public execute(invocation: ToolInvocation, signal?: AbortSignal): Promise<ExecutionResult> {
        const startTime = Date.now();
        const commandLine = [invocation.executablePath, ...invocation.args].join(' ');

        if (signal?.aborted) {
            console.log(`[ProcessRunner] Cancelled before start: ${commandLine}`);
            return Promise.resolve({
                stdout: '',
                stderr: '',
                exitCode: null,
                timedOut: false,
                cancelled: true,
                executionTime: 0
            });
        }

        return new Promise<ExecutionResult>((resolve, reject) => {
            let state: ProcessState = 'spawned';
            let settled = false;
            let failure: unknown;
            let stdout = '';
            let stderr = '';

            const child = cp.spawn(invocation.executablePath, [...invocation.args], {
                env: process.env,
                windowsHide: true
            });

            const stop = (next: ProcessState): void => {
                if (state !== 'spawned' && state !== 'running') {
                    return;
                }
                state = next;
                child.kill('SIGKILL');
                // close ждет всех владельцев pipe, включая потомков процесса
                child.stdin.destroy();
                child.stdout.destroy();
                child.stderr.destroy();
            };

            const onAbort = (): void => stop('cancelled');
            const timer = setTimeout(() => stop('timedOut'), clampTimeout(invocation.timeoutMs));
            signal?.addEventListener('abort', onAbort, { once: true });

            const cleanup = (): void => {
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
            };

            child.on('spawn', () => {
                if (state === 'spawned') {
                    state = 'running';
                }
            });

            child.on('error', (error) => {
                failure = failure ?? error;
                if (child.pid === undefined) {
                    // процесс не запустился, close может не прийти
                    if (!settled) {
                        state = 'failed';
                        cleanup();
                        console.error(`[ProcessRunner] Failed to start ${commandLine}: ${error.message}`);
                        reject(new ExecuteError(error));
                    }
                    return;
                }
                stop('failed');
            });

            child.stdout.setEncoding('utf8');
            child.stderr.setEncoding('utf8');
            child.stdout.on('data', (chunk: string) => {
                stdout += chunk;
            });
            child.stderr.on('data', (chunk: string) => {
                stderr += chunk;
            });

            child.stdin.on('error', (error) => {
                failure = failure ?? error;
                stop('failed');
            });

            child.on('close', (code) => {
                if (settled) {
                    return;
                }
                cleanup();

                if (state === 'spawned' || state === 'running') {
                    state = 'completed';
                }

                const executionTime = Date.now() - startTime;
                console.log(`[ProcessRunner] Command: ${commandLine}`);
                console.log(`[ProcessRunner] State: ${state}, exit code: ${code}, time: ${executionTime}ms`);

                if (state === 'failed') {
                    reject(new ExecuteError(failure, child.pid));
                    return;
                }

                resolve({
                    stdout,
                    stderr,
                    exitCode: state === 'completed' ? code : null,
                    timedOut: state === 'timedOut',
                    cancelled: state === 'cancelled',
                    executionTime,
                    pid: child.pid
                });
            });

            try {
                if (invocation.stdin !== undefined) {
                    child.stdin.write(invocation.stdin, 'utf8');
                }
            } finally {
                child.stdin.end();
            }
        });
    }
}
