/**
 * Настройки расширения (секция "cue")
 */

import * as vscode from 'vscode';
import { type CueSettings, DEFAULT_TIMEOUT_MS } from './cueCommandService';
import { clampTimeout } from './processRunner';

const SECTION = 'cue';

export class WorkspaceCueSettings implements CueSettings {

    /**
     * Путь к cue; пустая строка - искать в PATH
     */
    get executablePath(): string {
        return vscode.workspace.getConfiguration(SECTION).get<string>('executablePath', '');
    }

    get timeoutMs(): number {
        const timeout = vscode.workspace.getConfiguration(SECTION).get<number>('timeout', DEFAULT_TIMEOUT_MS);
        return timeout > 0 ? clampTimeout(timeout) : DEFAULT_TIMEOUT_MS;
    }

    get vetOnSave(): boolean {
        return vscode.workspace.getConfiguration(SECTION).get<boolean>('vetOnSave', true);
    }
}
