/**
 * FREQ command handler - Transmit frequency
 *
 * Echoes the new value back; no argument gives the placeholder reply.
 */

import { SettingCommand } from '../lib/base-command.js';

export class FreqCommand extends SettingCommand {
    readonly name = 'freq';
    readonly label = 'Freq';
}
