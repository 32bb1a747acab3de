/**
 * SELFCAL command handler - Self-calibration
 */

import { SettingCommand } from '../lib/base-command.js';

export class SelfcalCommand extends SettingCommand {
    readonly name = 'selfcal';
    readonly label = 'SelfCal';
}
