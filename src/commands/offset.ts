/**
 * OFFSET command handler - Frequency offset
 *
 * Echoes the new value back; no argument gives the placeholder reply.
 */

import { SettingCommand } from '../lib/base-command.js';

export class OffsetCommand extends SettingCommand {
    readonly name = 'offset';
    readonly label = 'Offset';
}
