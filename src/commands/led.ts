import { SettingCommand } from '../lib/base-command.js';

export class LedCommand extends SettingCommand {
    readonly name = 'led';
    readonly label = 'LED';
}
