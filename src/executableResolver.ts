/**
 * Поиск исполняемого файла cue
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExecutableNotFoundError } from './errors';

export const CUE_COMMAND = 'cue';

export interface ResolveOptions {
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
}

/**
 * Можно ли запустить файл
 */
export function isExecutableFile(filePath: string): boolean {
    try {
        if (!fs.statSync(filePath).isFile()) {
            return false;
        }
        fs.accessSync(filePath, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

function candidateNames(commandName: string, platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
    if (platform !== 'win32') {
        return [commandName];
    }

    const extensions = (env.PATHEXT || '.COM;.EXE;.BAT;.CMD')
        .split(';')
        .filter(ext => ext !== '');
    return extensions.map(ext => commandName + ext.toLowerCase());
}

/**
 * Поиск команды в каталогах PATH
 */
export function findInPath(commandName: string, options: ResolveOptions = {}): string | undefined {
    const env = options.env ?? process.env;
    const platform = options.platform ?? process.platform;
    const delimiter = platform === 'win32' ? ';' : ':';
    // На Windows переменная может называться Path
    const searchPath = env.PATH ?? env.Path ?? '';

    for (const dir of searchPath.split(delimiter)) {
        if (dir === '') {
            continue;
        }
        for (const name of candidateNames(commandName, platform, env)) {
            const fullPath = path.resolve(dir, name);
            if (isExecutableFile(fullPath)) {
                return fullPath;
            }
        }
    }

    return undefined;
}

/**
 * Путь к cue: из настроек, если задан, иначе поиск в PATH
 */
export function resolveExecutable(configuredPath?: string, options: ResolveOptions = {}): string {
    const customPath = configuredPath?.trim() ?? '';
    if (customPath !== '') {
        if (!isExecutableFile(customPath)) {
            throw new ExecutableNotFoundError('configuredPath', customPath);
        }
        return customPath;
    }

    const found = findInPath(CUE_COMMAND, options);
    if (found === undefined) {
        throw new ExecutableNotFoundError('searchPath');
    }
    return found;
}
