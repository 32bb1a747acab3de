/**
 * POWER command handler - Transmit power
 */

import { SettingCommand } from '../lib/base-command.js';

export class PowerCommand extends SettingCommand {
    readonly name = 'power';
    readonly label = 'Power';
}
