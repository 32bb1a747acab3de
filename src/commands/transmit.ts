/**
 * TRANSMIT command handler - Transmit control
 */

import { SettingCommand } from '../lib/base-command.js';

export class TransmitCommand extends SettingCommand {
    readonly name = 'transmit';
    readonly label = 'Transmit';
}
