/**
 * Тексты сообщений для пользователя
 */

const bundle: Record<string, string> = {
    'formatter.exeNotFound':
        'The cue executable was not found on PATH. Install cue or set "cue.executablePath" in the settings.',
    'formatter.userPathNotFound':
        'The configured cue executable "{0}" does not exist or is not executable. Check "cue.executablePath" in the settings.',
    'formatter.cueExecuteError': 'Failed to execute cue: {0}'
};

export class Messages {

    /**
     * Получить сообщение по ключу, подставив аргументы вместо {0}, {1}, ...
     */
    public static get(key: string, ...args: string[]): string {
        const template = bundle[key];
        if (template === undefined) {
            return key;
        }

        return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
            const value = args[Number(index)];
            return value === undefined ? placeholder : value;
        });
    }
}
