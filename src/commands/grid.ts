import { SettingCommand } from '../lib/base-command.js';

export class GridCommand extends SettingCommand {
    readonly name = 'grid';
    readonly label = 'Grid';
}
