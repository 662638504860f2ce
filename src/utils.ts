/**
 * Утилиты для работы с текстом
 */

/**
 * Разбить текст на строки (LF и CRLF)
 */
export function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/**
 * Разбить последовательность на группы подряд идущих элементов.
 * Каждый элемент, для которого startNewGroup вернул true, открывает новую группу;
 * первый элемент открывает группу в любом случае.
 *
 * [A, B, C, A, A, D] при x === A -> [[A, B, C], [A], [A, D]]
 */
export function groupByOrdered<T>(data: Iterable<T>, startNewGroup: (item: T) => boolean): T[][] {
    const groups: T[][] = [];
    let currentGroup: T[] | undefined;

    for (const item of data) {
        if (currentGroup === undefined || startNewGroup(item)) {
            currentGroup = [];
            groups.push(currentGroup);
        }
        currentGroup.push(item);
    }

    return groups;
}
