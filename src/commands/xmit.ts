import { ReportCommand } from '../lib/base-command.js';

export class XmitCommand extends ReportCommand {
    readonly name = 'xmit';

    report(): string {
        return 'Xmit <example response>';
    }
}
