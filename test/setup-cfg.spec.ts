// test/setup-cfg.spec.ts

import {describe, it, expect} from 'vitest';
import {resolveSettings} from '../src/core/config-loader';
import {
    consoleScript,
    modifySetupCfg,
    patchSetupCfgText,
    pythonRequiresValue,
} from '../src/core/setup-cfg';
import {deferred, file, reifyContent} from '../src/core/structure';

const settings = resolveSettings();
const opts = {project: 'demo-app', package: 'demo_app'};

const HOST_CFG = [
    '[metadata]',
    'name = {{ project_name }}',
    '',
    '[options]',
    'package_dir =',
    '    =src',
    '',
    '# Add here dependencies of your project',
    'install_requires =',
    '    importlib-metadata',
    '',
    '[options.packages.find]',
    'where = src',
    '',
].join('\n');

const PATCHED_CFG = [
    '[metadata]',
    'name = demo-app',
    '',
    '[options]',
    'package_dir =',
    '    =src',
    '',
    '# Add here dependencies of your project',
    '# Minimum Python Version 3.12 required',
    'python_requires = >=3.12,<3.13',
    'install_requires =',
    '    click>=8.1',
    '    pytest>=8',
    '    pytest-cov>=5',
    '',
    '[options.entry_points]',
    'console_scripts =',
    '    demo_app = demo_app.cli:cli',
    '',
    '[options.packages.find]',
    'where = src',
    '',
].join('\n');

describe('patchSetupCfgText', () => {
    it('sets requirements, pins python and adds the console script', () => {
        expect(patchSetupCfgText(HOST_CFG, opts, settings)).toBe(PATCHED_CFG);
    });

    it('is idempotent', () => {
        expect(patchSetupCfgText(PATCHED_CFG, opts, settings)).toBe(PATCHED_CFG);
    });

    it('puts console_scripts first in an existing entry points section', () => {
        const text = [
            '[options]',
            'install_requires =',
            '[options.entry_points]',
            'pytest11 =',
            '    demo = demo.plugin',
            'console_scripts =',
            '    old = old.cli:main',
            '',
        ].join('\n');

        expect(patchSetupCfgText(text, opts, settings)).toBe(
            [
                '[options]',
                '# Minimum Python Version 3.12 required',
                'python_requires = >=3.12,<3.13',
                'install_requires =',
                '    click>=8.1',
                '    pytest>=8',
                '    pytest-cov>=5',
                '[options.entry_points]',
                'console_scripts =',
                '    demo_app = demo_app.cli:cli',
                'pytest11 =',
                '    demo = demo.plugin',
                '',
            ].join('\n'),
        );
    });

    it('updates an existing python_requires in place', () => {
        const text = ['[options]', 'python_requires = >=3.8', 'install_requires = six', ''].join('\n');

        expect(patchSetupCfgText(text, opts, settings)).toBe(
            [
                '[options]',
                '# Minimum Python Version 3.12 required',
                'python_requires = >=3.12,<3.13',
                'install_requires =',
                '    click>=8.1',
                '    pytest>=8',
                '    pytest-cov>=5',
                '[options.entry_points]',
                'console_scripts =',
                '    demo_app = demo_app.cli:cli',
                '',
            ].join('\n'),
        );
    });

    it('uses configured requirements and python bounds', () => {
        const custom = resolveSettings({
            requirements: ['click>=8'],
            pythonMinimum: '3.11',
            pythonBelow: '3.14',
        });
        const out = patchSetupCfgText('[options]\ninstall_requires =\n', opts, custom);

        expect(out).toBe(
            [
                '[options]',
                '# Minimum Python Version 3.11 required',
                'python_requires = >=3.11,<3.14',
                'install_requires =',
                '    click>=8',
                '[options.entry_points]',
                'console_scripts =',
                '    demo_app = demo_app.cli:cli',
                '',
            ].join('\n'),
        );
        expect(pythonRequiresValue(custom)).toBe('>=3.11,<3.14');
    });

    it('replaces a requirement list that has comments between entries', () => {
        const text = '[options]\ninstall_requires =\n    click\n    # pinned for py3.8\n    requests\n';

        expect(patchSetupCfgText(text, opts, settings)).toBe(
            [
                '[options]',
                '# Minimum Python Version 3.12 required',
                'python_requires = >=3.12,<3.13',
                'install_requires =',
                '    click>=8.1',
                '    pytest>=8',
                '    pytest-cov>=5',
                '[options.entry_points]',
                'console_scripts =',
                '    demo_app = demo_app.cli:cli',
                '',
            ].join('\n'),
        );
    });

    it('keeps blank lines inside untouched values', () => {
        const text = [
            '[metadata]',
            'classifiers =',
            '    Development Status :: 4 - Beta',
            '',
            '    Programming Language :: Python',
            '',
            '[options]',
            'install_requires =',
            '',
        ].join('\n');

        expect(patchSetupCfgText(text, opts, settings)).toBe(
            [
                '[metadata]',
                'classifiers =',
                '    Development Status :: 4 - Beta',
                '',
                '    Programming Language :: Python',
                '',
                '[options]',
                '# Minimum Python Version 3.12 required',
                'python_requires = >=3.12,<3.13',
                'install_requires =',
                '    click>=8.1',
                '    pytest>=8',
                '    pytest-cov>=5',
                '[options.entry_points]',
                'console_scripts =',
                '    demo_app = demo_app.cli:cli',
                '',
            ].join('\n'),
        );
    });

    it('requires an [options] section', () => {
        expect(() => patchSetupCfgText('[metadata]\nname = x\n', opts, settings)).toThrow(
            'setup.cfg: missing required section [options].',
        );
    });
});

describe('consoleScript', () => {
    it('derives the package from a hyphenated project', () => {
        expect(consoleScript({project: 'my-tool'})).toBe('my_tool = my_tool.cli:cli');
    });
});

describe('modifySetupCfg', () => {
    it('keeps the write policy of the leaf', () => {
        const node = file(HOST_CFG, 'no-overwrite');
        const patched = modifySetupCfg(node, opts, settings);

        expect(patched.policy).toBe('no-overwrite');
        expect(reifyContent(patched.content, opts)).toBe(PATCHED_CFG);
    });

    it('refuses a leaf without content', () => {
        expect(() => modifySetupCfg(file(deferred(() => null)), opts, settings)).toThrow(
            'setup.cfg has no content to patch.',
        );
    });
});
