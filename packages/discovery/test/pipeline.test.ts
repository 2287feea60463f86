import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { beforeAll, describe, test, expect, vi } from 'vitest';
import { NotFoundError, type ParameterJson } from '@plugin-atlas/shared';
import { discoverPackage } from '../src/pipeline';
import { getLoadedParser, initTreeSitterParsers } from '../src/parsers/tree-sitter-loader';
import { toManifestJson } from '../src/manifest/serialize';
import { readPermissionsEnforced, withoutPermissions } from './support/fs';

const acmeRoot = path.join(__dirname, 'fixtures', 'packages', 'acme_models');

const acmeConfig = {
    module: 'acme_models.config',
    name: 'AcmeConfig',
    return_annotation: null,
    parameters: {
        model_year: { annotation: 'int', required: true },
        scenario: { annotation: 'str', default: '"base"', required: false },
        weather_year: { annotation: 'int | None', default: 'null', required: false },
    } satisfies Record<string, ParameterJson>,
};

const expectedManifest = {
    name: 'acme_models',
    plugins: [
        {
            name: 'acme-parser',
            plugin_type: 'parser',
            obj: {
                module: 'acme_models.parser',
                name: 'AcmeParser',
                type: 'class',
                return_annotation: null,
                parameters: {
                    config: { annotation: 'AcmeConfig', required: true },
                    data_path: { annotation: 'str', required: true },
                    year: { annotation: 'int', default: '2030', required: false },
                    skip_validation: { annotation: 'bool', default: 'false', required: false },
                    kwargs: { required: false },
                },
            },
            call_method: 'build_system',
            config: acmeConfig,
            io_type: 'stdout',
            requires_store: true,
        },
        {
            name: 'acme-exporter',
            plugin_type: 'exporter',
            obj: {
                module: 'acme_models.exporter',
                name: 'AcmeExporter',
                type: 'class',
                return_annotation: null,
                parameters: {
                    config: { required: true },
                    output_folder: { annotation: 'str', default: '"out"', required: false },
                },
            },
            config: acmeConfig,
            io_type: 'stdin',
        },
        {
            name: 'add-defaults',
            plugin_type: 'function',
            obj: {
                module: 'acme_models.plugins',
                name: 'add_defaults',
                type: 'function',
                return_annotation: null,
                parameters: {
                    system: { required: true },
                    value: { annotation: 'int', default: '5', required: false },
                },
            },
            description: 'Adds default values, (safely)',
        },
        {
            name: 'acme-upgrader',
            plugin_type: 'upgrader',
            obj: {
                module: 'acme_models.upgrader',
                name: 'AcmeUpgrader',
                type: 'class',
                return_annotation: null,
                parameters: {
                    path: { annotation: 'str', required: true },
                    target_version: { annotation: 'str | None', default: 'null', required: false },
                },
            },
            upgrade_steps: [
                {
                    name: 'rename_columns',
                    func: {
                        module: 'acme_models.upgrader.file_steps',
                        name: 'rename_columns',
                        type: 'function',
                        return_annotation: null,
                        parameters: {},
                    },
                    target_version: '2.0',
                    upgrade_type: 'FILE',
                    priority: 10,
                },
                {
                    name: 'migrate_units',
                    func: {
                        module: 'acme_models.upgrader.system_steps',
                        name: 'migrate_units',
                        type: 'function',
                        return_annotation: null,
                        parameters: {},
                    },
                    target_version: '2.1',
                    upgrade_type: 'SYSTEM',
                    priority: 100,
                    min_version: '1.5',
                },
            ],
        },
    ],
    metadata: {},
};

function recordingLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

beforeAll(async () => {
    await initTreeSitterParsers();
});

describe('discoverPackage', () => {
    test('extracts the full manifest with the textual locator', () => {
        const logger = recordingLogger();
        const { manifest, entryFile, metrics } = discoverPackage(acmeRoot, { strategy: 'text', logger });

        expect(toManifestJson(manifest)).toEqual(expectedManifest);
        expect(entryFile).toEqual({
            filePath: path.join(acmeRoot, 'plugins.py'),
            module: 'acme_models.plugins',
            source: 'package-dir',
        });
        expect(metrics).toMatchObject({
            registrations: 6,
            skipped: 1,
            duplicates: 1,
            plugins: 4,
            strategy: 'text',
            entryFile: path.join(acmeRoot, 'plugins.py'),
        });
        expect(logger.warn.mock.calls).toEqual([
            ["Duplicate plugin name 'acme-parser' ignored (first registration wins)"],
            [
                "Skipping registration (UnsupportedConstruct): Attribute access 'settings.parser_class' requires a Python runtime - unsupported in static mode",
            ],
        ]);
    });

    test('tree locator produces the same manifest', (ctx) => {
        if (!getLoadedParser('python')) return ctx.skip();

        const { manifest, metrics } = discoverPackage(acmeRoot, { strategy: 'tree' });
        expect(metrics.strategy).toBe('tree');
        expect(toManifestJson(manifest)).toEqual(expectedManifest);
    });

    test('package name and parameter switch are honored', () => {
        const { manifest } = discoverPackage(acmeRoot, {
            packageName: 'acme-models',
            strategy: 'text',
            resolveParameters: false,
        });
        expect(manifest.name).toBe('acme-models');
        expect(manifest.plugins.every((plugin) => Object.keys(plugin.obj.parameters).length === 0)).toBe(true);
    });

    describe('temporary packages', () => {
        let tmp = '';

        const write = (relative: string, content: string) => {
            const filePath = path.join(tmp, relative);
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.writeFileSync(filePath, content, 'utf8');
        };

        beforeAll(() => {
            tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'plugin-atlas-pipeline-'));
            write('no_entry/readme.txt', 'nothing here\n');
            write('no_function/plugins.py', 'from acme import Thing\n\ndef other():\n    pass\n');

            const sitePackages = path.join('venv', 'lib', 'python3.12', 'site-packages');
            write(
                path.join(sitePackages, 'acme_tools-0.3.0.dist-info', 'entry_points.txt'),
                '[r2x_plugin]\nacme-tools = acme_tools.registry:build_plugins\n',
            );
            write(path.join(sitePackages, 'acme_tools', '__init__.py'), '');
            write(
                path.join(sitePackages, 'acme_tools', 'registry.py'),
                [
                    'from acme_tools.parsers import CsvParser',
                    'from plugin_core import ParserPlugin',
                    '',
                    '',
                    'def build_plugins():',
                    '    return Package(name="acme-tools", plugins=[ParserPlugin(name="csv", obj=CsvParser)])',
                    '',
                ].join('\n'),
            );
            write('checkout/README.md', '# acme tools\n');
            return () => fs.rmSync(tmp, { recursive: true, force: true });
        });

        test('no entry file is NotFound', () => {
            expect(() => discoverPackage(path.join(tmp, 'no_entry'), { strategy: 'text' })).toThrow(NotFoundError);
        });

        test('missing register function is NotFound, never an empty manifest', () => {
            expect(() => discoverPackage(path.join(tmp, 'no_function'), { strategy: 'text' })).toThrow(
                'No registrations found in register_plugin()',
            );
        });

        test.skipIf(!readPermissionsEnforced())('an entry file that cannot be read is NotFound', () => {
            write('locked/plugins.py', 'def register_plugin():\n    return Package(plugins=[])\n');
            const entry = path.join(tmp, 'locked', 'plugins.py');

            withoutPermissions([entry], () => {
                expect(() => discoverPackage(path.join(tmp, 'locked'), { strategy: 'text' })).toThrow(NotFoundError);
                expect(() => discoverPackage(path.join(tmp, 'locked'), { strategy: 'text' })).toThrow(
                    `Failed to read ${entry}: `,
                );
            });
        });

        test('an installed entry point names the register function', () => {
            const { manifest, entryFile } = discoverPackage(path.join(tmp, 'checkout'), {
                packageName: 'acme-tools',
                virtualEnv: path.join(tmp, 'venv'),
                strategy: 'text',
                resolveParameters: false,
            });

            expect(entryFile.source).toBe('entry-points');
            expect(entryFile.functionName).toBe('build_plugins');
            expect(toManifestJson(manifest)).toEqual({
                name: 'acme-tools',
                plugins: [
                    {
                        name: 'csv',
                        plugin_type: 'parser',
                        obj: {
                            module: 'acme_tools.parsers',
                            name: 'CsvParser',
                            type: 'class',
                            return_annotation: null,
                            parameters: {},
                        },
                    },
                ],
                metadata: {},
            });
        });
    });
});
