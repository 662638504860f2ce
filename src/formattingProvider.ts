/**
 * FormattingProvider - форматирование документа через cue fmt
 */

import * as vscode from 'vscode';
import { CueCommandService } from './cueCommandService';
import { describeError, ExecutableNotFoundError } from './errors';

/**
 * AbortSignal, который срабатывает вместе с токеном отмены VSCode
 */
export function toAbortSignal(token: vscode.CancellationToken): { signal: AbortSignal; dispose(): void } {
    const controller = new AbortController();
    if (token.isCancellationRequested) {
        controller.abort();
        return { signal: controller.signal, dispose: () => undefined };
    }
    const subscription = token.onCancellationRequested(() => controller.abort());
    return { signal: controller.signal, dispose: () => subscription.dispose() };
}

export class FormattingProvider implements vscode.DocumentFormattingEditProvider {

    constructor(private readonly getService: () => CueCommandService) {}

    public async provideDocumentFormattingEdits(
        document: vscode.TextDocument,
        _options: vscode.FormattingOptions,
        token: vscode.CancellationToken
    ): Promise<vscode.TextEdit[]> {
        const cancellation = toAbortSignal(token);
        try {
            const formatted = await this.getService().format(document.getText(), cancellation.signal);
            if (formatted === undefined) {
                console.log(`[Formatter] cue fmt produced no result for ${document.uri.fsPath}`);
                return [];
            }
            if (formatted === document.getText()) {
                return [];
            }

            const fullRange = new vscode.Range(
                document.positionAt(0),
                document.positionAt(document.getText().length)
            );
            return [vscode.TextEdit.replace(fullRange, formatted)];
        } catch (error: unknown) {
            console.error('[Formatter] cue fmt failed:', describeError(error));
            if (error instanceof ExecutableNotFoundError) {
                void vscode.window.showErrorMessage(error.message);
                return [];
            }
            throw error;
        } finally {
            cancellation.dispose();
        }
    }
}
