// src/host/define-structure.ts

import type {Action, ScaffoldOpts, Structure} from '../schema';
import {DEFINE_STRUCTURE} from '../core/actions';
import {dir, file, merge, template} from '../core/structure';
import {toPackageName} from '../core/substitute';
import {bundledTemplates, type TemplateLoader} from '../core/templates';

export const VERIFY_OPTIONS = 'verify_options';

const PACKAGE_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface ProjectInput {
    /** Distribution name; also the directory the project is written to. */
    project: string;
    package?: string;
    author?: string;
    update?: boolean;
    force?: boolean;
}

/**
 * Options for one run, the way a scaffolding host fills them in before any
 * action sees them.
 */
export function defaultOptions(input: ProjectInput): ScaffoldOpts {
    const project = input.project.trim();
    if (!project) {
        throw new Error('Project name must not be empty.');
    }
    if (/[\\/]/.test(project)) {
        throw new Error(`Project name "${project}" must not contain path separators.`);
    }

    const bar = '='.repeat(project.length);
    return {
        project,
        package: input.package || toPackageName(project),
        name: project,
        author: input.author ?? 'Your Name',
        title: `${bar}\n${project}\n${bar}`,
        update: input.update ?? false,
        force: input.force ?? false,
    };
}

/**
 * Stops the pipeline early on a package name Python cannot import.
 */
export const verifyOptions: Action = {
    name: VERIFY_OPTIONS,
    run(structure: Structure, opts: ScaffoldOpts) {
        const pkg = opts.package;
        if (typeof pkg !== 'string' || !PACKAGE_RE.test(pkg)) {
            throw new Error(`"${String(pkg)}" is not a valid Python package name.`);
        }
        return {structure, opts};
    },
};

/**
 * The plain project a host lays down before extensions get involved.
 */
export function hostStructure(opts: ScaffoldOpts, templates: TemplateLoader): Structure {
    const pkg = typeof opts.package === 'string' ? opts.package : toPackageName(String(opts.project));
    const t = (name: string) => template(templates(`host/${name}`));

    return {
        '.gitignore': file(t('gitignore')),
        'README.rst': file(t('README.rst')),
        'AUTHORS.rst': file(t('AUTHORS.rst')),
        'CHANGELOG.rst': file(t('CHANGELOG.rst')),
        'CONTRIBUTING.rst': file(t('CONTRIBUTING.rst')),
        'LICENSE.txt': file(t('LICENSE.txt')),
        'setup.cfg': file(t('setup.cfg')),
        'setup.py': file(t('setup.py')),
        docs: dir({
            'conf.py': file(t('docs/conf.py')),
            'requirements.txt': file(t('docs/requirements.txt')),
            'index.rst': file(t('docs/index.rst')),
            'readme.rst': file(t('docs/readme.rst')),
            'authors.rst': file(t('docs/authors.rst')),
            'changelog.rst': file(t('docs/changelog.rst')),
            'contributing.rst': file(t('docs/contributing.rst')),
            'license.rst': file(t('docs/license.rst')),
        }),
        src: dir({
            [pkg]: dir({
                '__init__.py': file(t('init')),
                'skeleton.py': file(t('skeleton')),
            }),
        }),
        tests: dir({
            'conftest.py': file(t('conftest')),
            'test_skeleton.py': file(t('test_skeleton')),
        }),
    };
}

export function defineStructure(templates: TemplateLoader = bundledTemplates()): Action {
    return {
        name: DEFINE_STRUCTURE,
        run: (structure: Structure, opts: ScaffoldOpts) => ({
            structure: merge(structure, hostStructure(opts, templates), opts),
            opts,
        }),
    };
}

export function defaultActions(templates: TemplateLoader = bundledTemplates()): Action[] {
    return [verifyOptions, defineStructure(templates)];
}
