/**
 * VetOutputParser - парсинг вывода cue vet
 */

import type { LintingError } from './models/lintingError';
import { groupByOrdered, splitLines } from './utils';

export interface VetOutputFormat {
    /** Строки с этим префиксом относятся к предыдущему сообщению */
    continuationPrefix: string;

    /** Строка с позицией: группа 1 - номер строки, группа 2 - колонка */
    positionPattern: RegExp;
}

export const CUE_VET_FORMAT: VetOutputFormat = {
    continuationPrefix: '   ',
    positionPattern: /^ {4}.*:(\d+):(\d+)$/
};

export class VetOutputParser {
    private readonly format: VetOutputFormat;

    constructor(format: VetOutputFormat = CUE_VET_FORMAT) {
        this.format = format;
    }

    /**
     * Разбор вывода. Формат cue vet:
     *
     *   missing ',' before newline in list literal:
     *       ./LintingErrors.cue:7:1
     *   missing ',' in list literal:
     *       ./LintingErrors.cue:9:3
     *
     * Строки позиций, не совпавшие с шаблоном, пропускаются.
     */
    public parse(output: string, file: string): LintingError[] {
        const { continuationPrefix } = this.format;
        const groups = groupByOrdered(splitLines(output), line => !line.startsWith(continuationPrefix));

        const errors: LintingError[] = [];
        for (const [message, ...positionLines] of groups) {
            for (const positionLine of positionLines) {
                const position = this.parsePosition(positionLine);
                if (position) {
                    errors.push({ file, line: position.line, column: position.column, message });
                }
            }
        }
        return errors;
    }

    private parsePosition(text: string): { line: number; column: number } | undefined {
        const match = this.format.positionPattern.exec(text);
        if (!match || match[1] === undefined || match[2] === undefined) {
            return undefined;
        }

        const line = Number.parseInt(match[1], 10);
        const column = Number.parseInt(match[2], 10);
        if (!(line > 0 && column > 0)) {
            return undefined;
        }
        return { line, column };
    }
}
