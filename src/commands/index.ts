/**
 * Default command set
 */

import { CommandDispatcher } from '../lib/command-dispatcher.js';
import type { Command } from '../lib/types.js';
import { CallCommand } from './call.js';
import { FreqCommand } from './freq.js';
import { GridCommand } from './grid.js';
import { HelpCommand } from './help.js';
import { LedCommand } from './led.js';
import { OffsetCommand } from './offset.js';
import { PortCommand } from './port.js';
import { PowerCommand } from './power.js';
import { PpmCommand } from './ppm.js';
import { SelfcalCommand } from './selfcal.js';
import { TransmitCommand } from './transmit.js';
import { VersionCommand } from './version.js';
import { XmitCommand } from './xmit.js';

export interface DefaultCommandOptions {
    version?: string;
}

export function createDefaultDispatcher(options: DefaultCommandOptions = {}): CommandDispatcher {
    const commands: Command[] = [
        new TransmitCommand(),
        new CallCommand(),
        new GridCommand(),
        new PowerCommand(),
        new FreqCommand(),
        new PpmCommand(),
        new SelfcalCommand(),
        new OffsetCommand(),
        new LedCommand(),
        new PortCommand(),
        new XmitCommand(),
        new VersionCommand(options.version)
    ];

    // help reads the table back once the dispatcher exists
    let dispatcher: CommandDispatcher | undefined;
    commands.push(new HelpCommand(() => dispatcher?.getValidCommands() ?? []));

    dispatcher = new CommandDispatcher(commands);
    return dispatcher;
}
