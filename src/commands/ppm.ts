import { SettingCommand } from '../lib/base-command.js';

export class PpmCommand extends SettingCommand {
    readonly name = 'ppm';
    readonly label = 'PPM';
}
