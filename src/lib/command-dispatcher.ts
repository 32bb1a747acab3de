/**
 * Command Dispatcher
 *
 * Maps command names to handlers. The table is filled once in the
 * constructor and is read-only while the server is serving.
 */

import type { Command, CommandHandler } from './types.js';

export const HELP_COMMAND = 'help';

export function unknownCommandResponse(command: string): string {
    return `ERROR: Unknown command '${command}'. Type '${HELP_COMMAND}' for a list of commands.`;
}

export class CommandDispatcher implements CommandHandler {
    private readonly commands: ReadonlyMap<string, Command>;
    private readonly validCommands: ReadonlySet<string>;

    constructor(commands: readonly Command[]) {
        const table = new Map<string, Command>();

        for (const command of commands) {
            if (table.has(command.name)) {
                throw new Error(`Command '${command.name}' is already registered`);
            }
            table.set(command.name, command);
        }

        this.commands = table;
        this.validCommands = new Set(table.keys());
    }

    dispatch(command: string, argument: string): string {
        const handler = this.commands.get(command);

        if (!handler) {
            return unknownCommandResponse(command);
        }

        return handler.execute(argument);
    }

    handleCommand(command: string, argument: string): string {
        return this.dispatch(command, argument);
    }

    getValidCommands(): ReadonlySet<string> {
        return this.validCommands;
    }

    get size(): number {
        return this.commands.size;
    }
}
