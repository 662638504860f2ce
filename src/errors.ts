/**
 * Ошибки запуска cue
 */

import { Messages } from './messages';

export type NotFoundReason = 'configuredPath' | 'searchPath';

/**
 * Исполняемый файл cue не найден (процесс не запускался)
 */
export class ExecutableNotFoundError extends Error {
    public readonly reason: NotFoundReason;
    public readonly configuredPath?: string;

    constructor(reason: NotFoundReason, configuredPath?: string) {
        super(reason === 'configuredPath'
            ? Messages.get('formatter.userPathNotFound', configuredPath ?? '')
            : Messages.get('formatter.exeNotFound'));
        this.name = 'ExecutableNotFoundError';
        this.reason = reason;
        this.configuredPath = configuredPath;
    }
}

/**
 * Ошибка запуска процесса или работы с его потоками
 */
export class ExecuteError extends Error {
    /** pid процесса, если он был запущен */
    public readonly pid?: number;

    constructor(cause: unknown, pid?: number) {
        super(Messages.get('formatter.cueExecuteError', describeError(cause)), { cause });
        this.name = 'ExecuteError';
        this.pid = pid;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
