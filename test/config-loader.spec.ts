// test/config-loader.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {
    DEFAULT_SETTINGS,
    findConfigPath,
    loadClickstartConfig,
    resolveSettings,
    validateConfig,
} from '../src/core/config-loader';
import {Logger} from '../src/util/logger';

const logger = new Logger({level: 'silent'});

describe('loadClickstartConfig', () => {
    let cwd: string;

    beforeEach(() => {
        cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'clickstart-test-'));
    });

    afterEach(() => {
        fs.rmSync(cwd, {recursive: true, force: true});
    });

    it('returns an empty config when there is no file', async () => {
        await expect(loadClickstartConfig(cwd, {logger})).resolves.toEqual({
            config: {},
            configPath: null,
        });
    });

    it('loads a JSON config', async () => {
        const file = path.join(cwd, 'clickstart.config.json');
        fs.writeFileSync(file, JSON.stringify({layout: 'setup.cfg', requirements: ['click>=8']}));

        const result = await loadClickstartConfig(cwd, {logger});

        expect(result.configPath).toBe(file);
        expect(result.config).toEqual({layout: 'setup.cfg', requirements: ['click>=8']});
    });

    it('loads a CommonJS config', async () => {
        fs.writeFileSync(
            path.join(cwd, 'clickstart.config.cjs'),
            "module.exports = { pythonMinimum: '3.11' };\n",
        );

        const {config} = await loadClickstartConfig(cwd, {logger});
        expect(config).toEqual({pythonMinimum: '3.11'});
    });

    it('transpiles a TypeScript config', async () => {
        fs.writeFileSync(
            path.join(cwd, 'clickstart.config.ts'),
            "const config: {pythonBelow: string} = {pythonBelow: '3.14'};\nexport default config;\n",
        );

        const {config} = await loadClickstartConfig(cwd, {logger});
        expect(config).toEqual({pythonBelow: '3.14'});
    });

    it('prefers .ts over .json', () => {
        fs.writeFileSync(path.join(cwd, 'clickstart.config.json'), '{}');
        fs.writeFileSync(path.join(cwd, 'clickstart.config.ts'), 'export default {};\n');

        expect(findConfigPath(cwd)).toBe(path.join(cwd, 'clickstart.config.ts'));
    });

    it('fails on an explicit path that does not exist', async () => {
        await expect(loadClickstartConfig(cwd, {configPath: 'custom.json', logger})).rejects.toThrow(
            `Config file not found: ${path.join(cwd, 'custom.json')}`,
        );
    });

    it('reports invalid values with the file name', async () => {
        const file = path.join(cwd, 'clickstart.config.json');
        fs.writeFileSync(file, JSON.stringify({layout: 'poetry'}));

        await expect(loadClickstartConfig(cwd, {logger})).rejects.toThrow(
            `${file}: "layout" must be "pyproject" or "setup.cfg".`,
        );
    });
});

describe('validateConfig', () => {
    it('rejects anything but an object', () => {
        expect(() => validateConfig([])).toThrow('config: config must export an object.');
        expect(() => validateConfig('x', 'a.json')).toThrow('a.json: config must export an object.');
    });

    it('checks every field', () => {
        expect(() => validateConfig({requirements: 'click'})).toThrow(
            'config: "requirements" must be an array of strings.',
        );
        expect(() => validateConfig({pythonMinimum: 'three'})).toThrow(
            'config: "pythonMinimum" must be a version string like "3.12".',
        );
    });

    it('ignores unknown keys', () => {
        expect(validateConfig({layout: 'pyproject', extra: true})).toEqual({layout: 'pyproject'});
    });
});

describe('resolveSettings', () => {
    it('fills in the defaults', () => {
        expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
        expect(resolveSettings({pythonMinimum: '3.11'})).toEqual({
            layout: 'pyproject',
            requirements: ['click>=8.1', 'pytest>=8', 'pytest-cov>=5'],
            pythonMinimum: '3.11',
            pythonBelow: '3.13',
        });
    });
});
