/**
 * HELP command handler - List available commands
 *
 * The names come from whatever dispatcher the command is registered in,
 * so the list always matches what the server actually answers to.
 */

import { HELP_COMMAND } from '../lib/command-dispatcher.js';
import { ReportCommand } from '../lib/base-command.js';

export class HelpCommand extends ReportCommand {
    readonly name = HELP_COMMAND;

    constructor(private readonly listCommands: () => Iterable<string>) {
        super();
    }

    report(): string {
        return `Available commands: ${[...this.listCommands()].join(', ')}`;
    }
}
