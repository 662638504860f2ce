/**
 * Extension.ts - главный файл расширения
 */

import * as vscode from 'vscode';
import { CueCommandService } from './cueCommandService';
import { DiagnosticsProvider } from './diagnosticsProvider';
import { describeError, ExecutableNotFoundError } from './errors';
import { FormattingProvider } from './formattingProvider';
import { VetOutputParser } from './outputParser';
import { ProcessRunner } from './processRunner';
import { WorkspaceCueSettings } from './settings';

const CUE_LANGUAGE = 'cue';

let diagnosticsProvider: DiagnosticsProvider;
let settings: WorkspaceCueSettings;
let baseService: CueCommandService;

/**
 * Сервис с актуальным таймаутом из настроек
 */
function commandService(): CueCommandService {
    const timeoutMs = settings.timeoutMs;
    return timeoutMs === baseService.timeoutMs ? baseService : baseService.withTimeout(timeoutMs);
}

export function activate(context: vscode.ExtensionContext): void {
    console.log('CUE language support is now active');

    settings = new WorkspaceCueSettings();
    baseService = new CueCommandService({
        settings,
        runner: new ProcessRunner(),
        parser: new VetOutputParser(),
        timeoutMs: settings.timeoutMs
    });
    diagnosticsProvider = new DiagnosticsProvider();
    context.subscriptions.push(diagnosticsProvider);

    context.subscriptions.push(
        vscode.languages.registerDocumentFormattingEditProvider(
            CUE_LANGUAGE,
            new FormattingProvider(commandService)
        )
    );

    context.subscriptions.push(
        vscode.commands.registerCommand('cue.vet', vetCurrentFile)
    );

    context.subscriptions.push(
        vscode.workspace.onDidSaveTextDocument(document => {
            if (document.languageId === CUE_LANGUAGE && settings.vetOnSave) {
                void vetDocument(document, false);
            }
        })
    );

    context.subscriptions.push(
        vscode.workspace.onDidOpenTextDocument(document => {
            if (document.languageId === CUE_LANGUAGE && document.uri.scheme === 'file' && settings.vetOnSave) {
                void vetDocument(document, false);
            }
        })
    );

    context.subscriptions.push(
        vscode.workspace.onDidCloseTextDocument(document => {
            diagnosticsProvider.clearFile(document.uri);
        })
    );
}

/**
 * Запустить cue vet на текущем файле
 */
async function vetCurrentFile(): Promise<void> {
    const editor = vscode.window.activeTextEditor;

    if (!editor || editor.document.languageId !== CUE_LANGUAGE) {
        void vscode.window.showErrorMessage('No active CUE editor');
        return;
    }
    if (editor.document.isDirty) {
        await editor.document.save();
    }

    await vetDocument(editor.document, true);
}

/**
 * cue vet для документа; ошибки запуска показываются пользователю
 */
async function vetDocument(document: vscode.TextDocument, interactive: boolean): Promise<void> {
    if (document.uri.scheme !== 'file') {
        return;
    }

    try {
        const errors = await commandService().vet(document.uri.fsPath);
        console.log(`[Extension] cue vet found ${errors.length} problems in ${document.uri.fsPath}`);
        diagnosticsProvider.updateDiagnostics(document, errors);

        if (interactive && errors.length === 0) {
            void vscode.window.showInformationMessage('✓ No errors found');
        }
    } catch (error: unknown) {
        console.error('[Extension] cue vet failed:', describeError(error));
        // Без cue проверка при сохранении молчит, по команде - сообщаем
        if (interactive || !(error instanceof ExecutableNotFoundError)) {
            void vscode.window.showErrorMessage(describeError(error));
        }
    }
}

export function deactivate(): void {
    diagnosticsProvider?.clear();
}
