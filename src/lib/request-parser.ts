/**
 * Parses a raw request line into a command name and its argument.
 */

import type { CommandRequest } from './types.js';

// Only these four count as padding; other whitespace is part of the request.
const PADDING = ' \t\r\n';

export function trimPadding(value: string): string {
    let start = 0;
    let end = value.length;

    while (start < end && PADDING.includes(value[start])) {
        start++;
    }
    while (end > start && PADDING.includes(value[end - 1])) {
        end--;
    }

    return value.slice(start, end);
}

export function parseRequest(raw: string): CommandRequest {
    const input = trimPadding(raw);
    const space = input.indexOf(' ');

    if (space === -1) {
        return { command: input, argument: '' };
    }

    return {
        command: input.slice(0, space),
        argument: trimPadding(input.slice(space + 1))
    };
}
