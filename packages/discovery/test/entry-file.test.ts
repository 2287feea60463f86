import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { NotFoundError } from '@plugin-atlas/shared';
import { findEntryFile, parseEntryPoints } from '../src/entry/entry-file';

let tmp: string;

function write(relative: string, content = ''): string {
    const filePath = path.join(tmp, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
}

beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'plugin-atlas-entry-'));
});

afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
});

test('parseEntryPoints reads only the requested group', () => {
    const content = [
        '[console_scripts]',
        'acme = acme_tools.cli:main',
        '',
        '[r2x_plugin]',
        '# registered plugins',
        'acme-tools = acme_tools.registry:register_plugin',
        'bare = acme_tools.plugins',
    ].join('\n');

    expect(parseEntryPoints(content)).toEqual([
        { name: 'acme-tools', module: 'acme_tools.registry', attribute: 'register_plugin' },
        { name: 'bare', module: 'acme_tools.plugins' },
    ]);
    expect(parseEntryPoints(content, 'console_scripts')).toEqual([
        { name: 'acme', module: 'acme_tools.cli', attribute: 'main' },
    ]);
});

describe('findEntryFile', () => {
    test('prefers plugins.py over plugin.py in the package directory', () => {
        write('acme_models/__init__.py');
        const plugins = write('acme_models/plugins.py');
        write('acme_models/plugin.py');

        expect(findEntryFile(path.join(tmp, 'acme_models'))).toEqual({
            filePath: plugins,
            module: 'acme_models.plugins',
            source: 'package-dir',
        });
    });

    test('looks one level down for a src layout', () => {
        const plugin = write('project/src/plugin.py');
        write('project/.hidden/plugins.py');

        expect(findEntryFile(path.join(tmp, 'project'))).toEqual({
            filePath: plugin,
            module: 'plugin',
            source: 'package-dir',
        });
    });

    test('uses the installed entry point when a virtual environment is given', () => {
        const sitePackages = path.join('venv', 'lib', 'python3.11', 'site-packages');
        write(
            path.join(sitePackages, 'acme_tools-1.2.0.dist-info', 'entry_points.txt'),
            '[r2x_plugin]\nacme-tools = acme_tools.registry:build_plugins\n',
        );
        write(path.join(sitePackages, 'acme_tools', '__init__.py'));
        const registry = write(path.join(sitePackages, 'acme_tools', 'registry.py'));
        write('checkout/plugins.py');

        const entry = findEntryFile(path.join(tmp, 'checkout'), {
            packageName: 'Acme-Tools',
            virtualEnv: path.join(tmp, 'venv'),
        });
        expect(entry).toEqual({
            filePath: registry,
            module: 'acme_tools.registry',
            functionName: 'build_plugins',
            source: 'entry-points',
        });
    });

    test('a version mismatch falls back to the package directory', () => {
        const sitePackages = path.join('venv', 'lib', 'python3.11', 'site-packages');
        write(
            path.join(sitePackages, 'acme_tools-1.2.0.dist-info', 'entry_points.txt'),
            '[r2x_plugin]\nacme-tools = acme_tools.registry:build_plugins\n',
        );
        write(path.join(sitePackages, 'acme_tools', 'registry.py'));
        const local = write('checkout/plugins.py');

        const entry = findEntryFile(path.join(tmp, 'checkout'), {
            packageName: 'acme-tools',
            version: '2.0.0',
            virtualEnv: path.join(tmp, 'venv'),
        });
        expect(entry.filePath).toBe(local);
        expect(entry.source).toBe('package-dir');
    });

    test('throws NotFound when no candidate exists', () => {
        fs.mkdirSync(path.join(tmp, 'empty', 'node_modules'), { recursive: true });
        write('empty/node_modules/plugins.py');

        expect(() => findEntryFile(path.join(tmp, 'empty'))).toThrow(NotFoundError);
        expect(() => findEntryFile(path.join(tmp, 'empty'))).toThrow(
            `plugins.py or plugin.py not found in: ${path.join(tmp, 'empty')}`,
        );
    });
});
