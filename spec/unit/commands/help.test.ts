import { describe, test, expect } from 'vitest';
import { HelpCommand } from '@src/commands/help.js';
import { createDefaultDispatcher } from '@src/commands/index.js';

describe('HELP command', () => {
    test('should list the names it is given', () => {
        const command = new HelpCommand(() => ['alpha', 'beta']);

        expect(command.name).toBe('help');
        expect(command.execute('')).toBe('Available commands: alpha, beta');
    });

    test('should ignore any arguments', () => {
        const command = new HelpCommand(() => ['alpha']);

        expect(command.execute('alpha')).toBe('Available commands: alpha');
    });

    test('should list every command of the default set in order', () => {
        const dispatcher = createDefaultDispatcher();

        expect(dispatcher.dispatch('help', '')).toBe(
            'Available commands: transmit, call, grid, power, freq, ppm, selfcal, offset, led, port, xmit, version, help'
        );
    });
});

describe('Default command set', () => {
    test('should register thirteen commands', () => {
        const dispatcher = createDefaultDispatcher();

        expect(dispatcher.size).toBe(13);
        expect(dispatcher.getValidCommands().has('power')).toBe(true);
    });

    test('should pass the version through', () => {
        const dispatcher = createDefaultDispatcher({ version: '9.9.9' });

        expect(dispatcher.dispatch('version', '')).toBe('Version 9.9.9');
    });

    test('should build independent dispatchers', () => {
        const first = createDefaultDispatcher({ version: '1.1.1' });
        const second = createDefaultDispatcher({ version: '2.2.2' });

        expect(first.dispatch('version', '')).toBe('Version 1.1.1');
        expect(second.dispatch('version', '')).toBe('Version 2.2.2');
    });
});
