// test/logger.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, describe, it, expect, vi} from 'vitest';
import {Logger, parseLogLevel} from '../src/util/logger';
import {clickstartVersion} from '../src/util/package-info';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('parseLogLevel', () => {
    it('accepts known levels in any case', () => {
        expect(parseLogLevel(' DEBUG ')).toBe('debug');
        expect(parseLogLevel('silent')).toBe('silent');
    });

    it('falls back on unknown or missing values', () => {
        expect(parseLogLevel(undefined)).toBe('info');
        expect(parseLogLevel('loud', 'warn')).toBe('warn');
    });
});

describe('Logger', () => {
    it('drops messages below its level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

        const logger = new Logger({level: 'info'});
        logger.info('shown');
        logger.debug('hidden');

        expect(log).toHaveBeenCalledTimes(1);
        expect(debug).not.toHaveBeenCalled();
    });

    it('stacks child prefixes and copies the level', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const child = new Logger({level: 'error', prefix: '[a]'}).child('[b]');
        expect(child.getLevel()).toBe('error');

        child.error(new Error('failed'));
        const [line] = error.mock.calls[0];
        expect(String(line)).toContain('[a][b]');
        expect(String(line)).toContain('failed');
    });

    it('is quiet when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        new Logger({level: 'silent'}).error('nope');
        expect(error).not.toHaveBeenCalled();
    });
});

describe('clickstartVersion', () => {
    it('reads the version from package.json', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clickstart-version-'));
        const file = path.join(dir, 'package.json');
        fs.writeFileSync(file, JSON.stringify({name: 'x', version: '1.2.3'}));

        expect(clickstartVersion(file)).toBe('1.2.3');
        expect(clickstartVersion(path.join(dir, 'missing.json'))).toBe('unknown');

        fs.rmSync(dir, {recursive: true, force: true});
    });
});
