/**
 * Модели вызова cue и результатов проверки
 */

/**
 * Ошибка, найденная `cue vet`
 */
export interface LintingError {
    /** Файл, переданный в проверку (путь из вывода cue не используется) */
    file: string;

    /** Номер строки (начинается с 1) */
    line: number;

    /** Номер колонки (начинается с 1) */
    column: number;

    /** Текст сообщения, общий для всей группы */
    message: string;
}

/**
 * Один запуск внешней утилиты
 */
export interface ToolInvocation {
    readonly executablePath: string;
    readonly args: readonly string[];
    /** Данные для stdin; если не заданы, stdin закрывается сразу */
    readonly stdin?: string;
    readonly timeoutMs: number;
}

/**
 * Результат выполнения процесса
 */
export interface ExecutionResult {
    stdout: string;
    stderr: string;

    /** Код выхода; null, если процесс не завершился сам */
    exitCode: number | null;

    timedOut: boolean;
    cancelled: boolean;

    /** Время выполнения в миллисекундах */
    executionTime: number;

    pid?: number;
}

/**
 * Завершился ли процесс сам с кодом выхода
 */
export function isCompleted(result: ExecutionResult): boolean {
    return !result.timedOut && !result.cancelled && result.exitCode !== null;
}
