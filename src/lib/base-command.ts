/**
 * Base classes for command handlers
 */

import type { Command } from './types.js';

export abstract class BaseCommand implements Command {
    abstract readonly name: string;

    abstract execute(argument: string): string;

    protected hasArgument(argument: string): boolean {
        return argument.length > 0;
    }
}

/**
 * A command that sets a value when given one and answers with a
 * placeholder when called bare.
 */
export abstract class SettingCommand extends BaseCommand {
    abstract readonly label: string;

    execute(argument: string): string {
        if (!this.hasArgument(argument)) {
            return `${this.label} <example response>`;
        }

        return `${this.label} set to ${argument}`;
    }
}

/**
 * A command that takes no argument; anything passed is ignored.
 */
export abstract class ReportCommand extends BaseCommand {
    abstract report(): string;

    execute(_argument: string): string {
        return this.report();
    }
}
