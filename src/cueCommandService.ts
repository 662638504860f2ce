/**
 * CueCommandService - вызовы cue fmt и cue vet
 */

import * as path from 'path';
import { resolveExecutable, type ResolveOptions } from './executableResolver';
import { type ExecutionResult, isCompleted, type LintingError } from './models/lintingError';
import { VetOutputParser } from './outputParser';
import type { CommandRunner } from './processRunner';

export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Настройки, которые сервис читает при каждом вызове
 */
export interface CueSettings {
    readonly executablePath?: string;
}

export interface CueCommandServiceOptions {
    settings: CueSettings;
    runner: CommandRunner;
    parser?: VetOutputParser;
    timeoutMs?: number;
    resolveOptions?: ResolveOptions;
}

export class CueCommandService {
    public readonly timeoutMs: number;
    private readonly options: CueCommandServiceOptions;
    private readonly parser: VetOutputParser;

    constructor(options: CueCommandServiceOptions) {
        this.options = options;
        this.parser = options.parser ?? new VetOutputParser();
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    /**
     * Тот же сервис с другим таймаутом
     */
    public withTimeout(timeoutMs: number): CueCommandService {
        return new CueCommandService({ ...this.options, parser: this.parser, timeoutMs });
    }

    /**
     * cue fmt: содержимое передается в stdin, результат - stdout.
     * undefined при ненулевом коде выхода, таймауте или отмене.
     */
    public async format(content: string, signal?: AbortSignal): Promise<string | undefined> {
        const result = await this.run(['fmt', '-'], content, signal);
        if (!isCompleted(result) || result.exitCode !== 0) {
            return undefined;
        }
        return result.stdout;
    }

    /**
     * cue vet для файла на диске.
     * Вывод разбирается и при ненулевом коде выхода: так cue сообщает о найденных ошибках.
     */
    public async vet(file: string, signal?: AbortSignal): Promise<LintingError[]> {
        const result = await this.run(['vet', path.resolve(file)], undefined, signal);
        if (!isCompleted(result)) {
            return [];
        }
        // cue пишет отчет в stderr, старые версии - в stdout; группы не переходят между потоками
        return [
            ...this.parser.parse(result.stdout, file),
            ...this.parser.parse(result.stderr, file)
        ];
    }

    private run(args: string[], stdin: string | undefined, signal?: AbortSignal): Promise<ExecutionResult> {
        const executablePath = resolveExecutable(this.options.settings.executablePath, this.options.resolveOptions);
        return this.options.runner.execute({ executablePath, args, stdin, timeoutMs: this.timeoutMs }, signal);
    }
}
