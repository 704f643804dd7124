// test/structure.spec.ts

import {describe, it, expect} from 'vitest';
import {
    deferred,
    dir,
    file,
    getFile,
    getNode,
    listFiles,
    merge,
    reifyContent,
    reject,
    rejectMatching,
    resolveLeaf,
    setNode,
    template,
} from '../src/core/structure';
import type {FileNode, Structure} from '../src/schema';

function textOf(node: FileNode | undefined): string | null | undefined {
    return node ? reifyContent(node.content, {}) : undefined;
}

const base: Structure = {
    'README.rst': file('readme'),
    src: dir({
        demo: dir({
            '__init__.py': file('init'),
            'skeleton.py': file('skeleton'),
        }),
    }),
};

describe('merge', () => {
    it('unions directories recursively', () => {
        const merged = merge(base, {src: dir({demo: dir({'cli.py': file('cli')})})});

        expect(listFiles(merged).map(([p]) => p)).toEqual([
            'README.rst',
            'src/demo/__init__.py',
            'src/demo/skeleton.py',
            'src/demo/cli.py',
        ]);
    });

    it('replaces an existing file with an overwrite leaf', () => {
        const merged = merge(base, {'README.rst': file('new', 'overwrite')});
        expect(textOf(getFile(merged, 'README.rst'))).toBe('new');
    });

    it('keeps an existing file under no-overwrite', () => {
        const merged = merge(base, {'README.rst': file('new', 'no-overwrite')});
        expect(textOf(getFile(merged, 'README.rst'))).toBe('readme');
    });

    it('keeps an existing file under skip-on-update only when updating', () => {
        const addition = {'README.rst': file('new', 'skip-on-update')};

        expect(textOf(getFile(merge(base, addition, {update: true}), 'README.rst'))).toBe('readme');
        expect(textOf(getFile(merge(base, addition, {update: false}), 'README.rst'))).toBe('new');
    });

    it('does not modify its inputs', () => {
        merge(base, {'extra.txt': file('x')});
        expect(Object.keys(base)).toEqual(['README.rst', 'src']);
    });
});

describe('reject', () => {
    it('removes a nested file and keeps the emptied parent', () => {
        const once = reject(base, 'src/demo/skeleton.py');
        const twice = reject(once, ['src', 'demo', '__init__.py']);

        expect(getNode(twice, 'src/demo')).toEqual({type: 'dir', children: {}});
    });

    it('returns the same tree for a missing path', () => {
        expect(reject(base, 'src/demo/missing.py')).toBe(base);
        expect(reject(base, 'nope/deeper')).toBe(base);
        expect(reject(base, 'README.rst/child')).toBe(base);
    });
});

describe('rejectMatching', () => {
    it('only matches top-level files for a top-level glob', () => {
        const tree = merge(base, {docs: dir({'index.rst': file('docs')})});
        const remaining = rejectMatching(tree, '*.rst');

        expect(listFiles(remaining).map(([p]) => p)).toEqual([
            'src/demo/__init__.py',
            'src/demo/skeleton.py',
            'docs/index.rst',
        ]);
    });
});

describe('setNode', () => {
    it('creates intermediate directories', () => {
        const tree = setNode({}, 'a/b/c.txt', file('c'));
        expect(textOf(getFile(tree, ['a', 'b', 'c.txt']))).toBe('c');
    });

    it('refuses an empty path', () => {
        expect(() => setNode({}, '', file('x'))).toThrow('Cannot set a node at an empty path.');
    });
});

describe('content', () => {
    it('renders deferred templates with the run options', () => {
        const node = file(template('import ${package}'), 'no-overwrite');
        expect(resolveLeaf(node, {project: 'my-app'})).toEqual(['import my_app', 'no-overwrite']);
    });

    it('passes null content through', () => {
        expect(reifyContent(null, {})).toBeNull();
        expect(reifyContent(deferred(() => null), {})).toBeNull();
    });

    it('rejects a producer that does not return text', () => {
        const broken = deferred(() => JSON.parse('42'));
        expect(() => reifyContent(broken, {})).toThrow(TypeError);
    });
});
