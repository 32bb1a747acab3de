/**
 * PORT command handler
 */

import { ReportCommand } from '../lib/base-command.js';

export class PortCommand extends ReportCommand {
    readonly name = 'port';

    report(): string {
        return 'Port <example response>';
    }
}
