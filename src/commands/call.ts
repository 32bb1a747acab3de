/**
 * CALL command handler - Station callsign
 *
 * Echoes the new value back; no argument gives the placeholder reply.
 */

import { SettingCommand } from '../lib/base-command.js';

export class CallCommand extends SettingCommand {
    readonly name = 'call';
    readonly label = 'Call';
}
