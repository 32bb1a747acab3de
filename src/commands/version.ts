/**
 * VERSION command handler
 */

import { ReportCommand } from '../lib/base-command.js';

export const DEFAULT_VERSION = '1.0.0';

export class VersionCommand extends ReportCommand {
    readonly name = 'version';

    constructor(private readonly version: string = DEFAULT_VERSION) {
        super();
    }

    report(): string {
        return `Version ${this.version}`;
    }
}
