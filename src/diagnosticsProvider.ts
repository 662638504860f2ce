/**
 * DiagnosticsProvider - ошибки cue vet в редакторе
 */

import * as vscode from 'vscode';
import type { LintingError } from './models/lintingError';

export class DiagnosticsProvider implements vscode.Disposable {
    private diagnosticCollection: vscode.DiagnosticCollection;

    constructor() {
        this.diagnosticCollection = vscode.languages.createDiagnosticCollection('cue');
    }

    /**
     * Заменить диагностику документа
     */
    public updateDiagnostics(document: vscode.TextDocument, errors: LintingError[]): void {
        const diagnostics = errors.map(error => this.createDiagnostic(document, error));
        this.diagnosticCollection.set(document.uri, diagnostics);
    }

    private createDiagnostic(document: vscode.TextDocument, error: LintingError): vscode.Diagnostic {
        // VSCode использует 0-based индексы
        const line = Math.min(error.line - 1, Math.max(document.lineCount - 1, 0));
        const column = error.column - 1;
        const lineEnd = document.lineAt(line).range.end.character;

        const range = new vscode.Range(line, Math.min(column, lineEnd), line, Math.max(lineEnd, column + 1));
        const diagnostic = new vscode.Diagnostic(range, error.message, vscode.DiagnosticSeverity.Error);
        diagnostic.source = 'cue vet';
        return diagnostic;
    }

    public clearFile(uri: vscode.Uri): void {
        this.diagnosticCollection.delete(uri);
    }

    public clear(): void {
        this.diagnosticCollection.clear();
    }

    public dispose(): void {
        this.diagnosticCollection.dispose();
    }
}
