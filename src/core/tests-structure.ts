// src/core/tests-structure.ts

import type {ScaffoldOpts, Structure} from '../schema';
import {dir, file, merge, template} from './structure';
import type {TemplateLoader} from './templates';

/**
 * Split the test suite into fast unit tests and integration tests, with a
 * README explaining how to run each part.
 *
 * The smoke tests are `skip-on-update` so regenerating a project leaves
 * whatever the user turned them into alone.
 */
export function amendTests(
    structure: Structure,
    opts: ScaffoldOpts,
    templates: TemplateLoader,
): Structure {
    return merge(
        structure,
        {
            tests: dir({
                'README.md': file(template(templates('tests_readme')), 'no-overwrite'),
                unit: dir({
                    'test_import.py': file(template(templates('test_import')), 'skip-on-update'),
                }),
                integration: dir({
                    'test_layout.py': file(template(templates('test_layout')), 'skip-on-update'),
                }),
            }),
        },
        opts,
    );
}
