import * as fs from 'node:fs';
import * as path from 'node:path';
import { describe, test, expect, vi } from 'vitest';
import {
    SourceFileIndex,
    extractCallableParameters,
    parameterSearchRoots,
    parseParameterList,
    parseSignature,
    serializeDefault,
} from '../src/scanners/parameters';
import { readPermissionsEnforced, withTempTree, withoutPermissions } from './support/fs';

const packagesRoot = path.join(__dirname, 'fixtures', 'packages');

describe('parseParameterList', () => {
    test('annotation and default make a parameter optional', () => {
        expect(parseParameterList('self, a: int, b: str = "x"')).toEqual({
            a: { annotation: 'int', required: true },
            b: { annotation: 'str', default: '"x"', required: false },
        });
    });

    test('handles markers, variadics and nested defaults', () => {
        expect(parseParameterList('cls, a, /, b=(1, 2), *args, c: Dict[str, int] = {}, **kwargs')).toEqual({
            a: { required: true },
            b: { default: '(1, 2)', required: false },
            args: { required: false },
            c: { annotation: 'Dict[str, int]', default: '{}', required: false },
            kwargs: { required: false },
        });
    });

    test('ignores comments between parameters', () => {
        expect(parseParameterList('\n    path: str,  # input, folder\n    strict: bool = True,\n')).toEqual({
            path: { annotation: 'str', required: true },
            strict: { annotation: 'bool', default: 'true', required: false },
        });
    });
});

test('serializeDefault', () => {
    expect(serializeDefault('None')).toBe('null');
    expect(serializeDefault('False')).toBe('false');
    expect(serializeDefault('1_000')).toBe('1_000');
    expect(serializeDefault('-2.5e3')).toBe('-2.5e3');
    expect(serializeDefault("'base'")).toBe('"base"');
    expect(serializeDefault('Path.cwd()')).toBe('Path.cwd()');
});

describe('parseSignature', () => {
    test('class constructor parameters', () => {
        const source = [
            'class Exporter(Base):',
            '    """Writes files."""',
            '',
            '    def __init__(self, a: int, b: str = "x") -> None:',
            '        self.a = a',
            '',
            '    def export(self, extra):',
            '        pass',
        ].join('\n');
        expect(parseSignature(source, 'Exporter')).toEqual({
            parameters: {
                a: { annotation: 'int', required: true },
                b: { annotation: 'str', default: '"x"', required: false },
            },
        });
    });

    test('annotated class fields when there is no constructor', () => {
        const source = [
            'class Settings(BaseModel):',
            '    year: int',
            '    label: str = "base"  # shown in reports',
            '    VERSION: ClassVar[str] = "1"',
            '    _cache: dict = {}',
            '',
            '    def helper(self):',
            '        local: int = 1',
        ].join('\n');
        expect(parseSignature(source, 'Settings')).toEqual({
            parameters: {
                year: { annotation: 'int', required: true },
                label: { annotation: 'str', default: '"base"', required: false },
            },
        });
    });

    test('top-level function parameters and return annotation', () => {
        const source = 'def add_defaults(system, value: int = 5) -> System:\n    return system\n';
        expect(parseSignature(source, 'add_defaults')).toEqual({
            parameters: {
                system: { required: true },
                value: { annotation: 'int', default: '5', required: false },
            },
            returnAnnotation: 'System',
        });
    });

    test('methods are not top-level functions', () => {
        expect(parseSignature('class A:\n    def run(self, x):\n        pass\n', 'run')).toBeNull();
    });
});

describe('extractCallableParameters', () => {
    const roots = [packagesRoot];

    test('constructor with keyword-only section', () => {
        expect(extractCallableParameters('acme_models.parser', 'AcmeParser', { roots })).toEqual({
            parameters: {
                config: { annotation: 'AcmeConfig', required: true },
                data_path: { annotation: 'str', required: true },
                year: { annotation: 'int', default: '2030', required: false },
                skip_validation: { annotation: 'bool', default: 'false', required: false },
                kwargs: { required: false },
            },
        });
    });

    test('model fields', () => {
        expect(extractCallableParameters('acme_models.config', 'AcmeConfig', { roots }).parameters).toEqual({
            model_year: { annotation: 'int', required: true },
            scenario: { annotation: 'str', default: '"base"', required: false },
            weather_year: { annotation: 'int | None', default: 'null', required: false },
        });
    });

    test('class defined in a package __init__.py', () => {
        expect(extractCallableParameters('acme_models.upgrader', 'AcmeUpgrader', { roots }).parameters).toEqual({
            path: { annotation: 'str', required: true },
            target_version: { annotation: 'str | None', default: 'null', required: false },
        });
    });

    test('missing definitions give an empty result', () => {
        expect(extractCallableParameters('acme_models.parser', 'Missing', { roots })).toEqual({ parameters: {} });
        expect(extractCallableParameters('nowhere.module', 'Thing', { roots })).toEqual({ parameters: {} });
    });
});

describe('SourceFileIndex', () => {
    test('walks each root once per index', () => {
        withTempTree('params', { 'pkg/first.py': 'class First:\n    def __init__(self, a):\n        self.a = a\n' }, (root) => {
            const index = new SourceFileIndex();
            expect(extractCallableParameters('pkg.first', 'First', { roots: [root], index }).parameters).toEqual({
                a: { required: true },
            });

            fs.writeFileSync(path.join(root, 'pkg', 'second.py'), 'def build(b):\n    pass\n', 'utf8');
            expect(extractCallableParameters('pkg.second', 'build', { roots: [root], index })).toEqual({
                parameters: {},
            });
            expect(extractCallableParameters('pkg.second', 'build', { roots: [root] }).parameters).toEqual({
                b: { required: true },
            });
        });
    });

    test('merges several file names in walk order', () => {
        withTempTree(
            'params',
            { 'b/tools.py': '', 'a/tools/__init__.py': '', 'a/other.py': '' },
            (root) => {
                expect(new SourceFileIndex().filesNamed(root, 'tools.py', '__init__.py', 'tools.py')).toEqual([
                    path.join(root, 'a', 'tools', '__init__.py'),
                    path.join(root, 'b', 'tools.py'),
                ]);
            },
        );
    });

    test.skipIf(!readPermissionsEnforced())('skips unreadable candidates and directories', () => {
        withTempTree(
            'params',
            {
                'locked/parser.py': 'class AcmeParser:\n    def __init__(self, a: str):\n        self.a = a\n',
                'models/parser.py': 'class AcmeParser:\n    def __init__(self, b: int):\n        self.b = b\n',
                'sealed/parser.py': 'class AcmeParser:\n    def __init__(self, c: int):\n        self.c = c\n',
            },
            (root) => {
                const locked = path.join(root, 'locked', 'parser.py');
                const sealed = path.join(root, 'sealed');
                const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

                withoutPermissions([locked, sealed], () => {
                    expect(
                        extractCallableParameters('acme.parser', 'AcmeParser', { roots: [root], logger }).parameters,
                    ).toEqual({ b: { annotation: 'int', required: true } });
                });
                expect(logger.debug).toHaveBeenCalledWith(
                    expect.stringContaining(`Skipping unreadable file ${locked}: `),
                );
                expect(logger.debug).toHaveBeenCalledWith(
                    expect.stringContaining(`Skipping unreadable directory ${sealed}: `),
                );
            },
        );
    });
});

test('parameterSearchRoots keeps priority order without duplicates', () => {
    expect(parameterSearchRoots('/work/pkg', '/opt/venv', '/work/pkg')).toEqual([
        path.resolve('/work/pkg'),
        path.resolve('/opt/venv'),
    ]);
    expect(parameterSearchRoots('/work/pkg', null, '/home/user')).toEqual([
        path.resolve('/work/pkg'),
        path.resolve('/home/user'),
    ]);
});
