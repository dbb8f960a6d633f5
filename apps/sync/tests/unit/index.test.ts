import { parseMode } from '../../src/index';
import { ConfigError } from '../../src/lib/sync-errors';

describe('parseMode', () => {
    test('defaults to a single run', () => {
        expect(parseMode([])).toBe('once');
    });

    test('accepts the worker mode', () => {
        expect(parseMode(['worker'])).toBe('worker');
    });

    test('rejects anything else', () => {
        expect(() => parseMode(['daemon'])).toThrow(ConfigError);
        expect(() => parseMode(['daemon'])).toThrow('Unknown mode "daemon", expected "once" or "worker"');
    });
});
