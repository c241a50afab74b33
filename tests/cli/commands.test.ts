import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import stripAnsi from 'strip-ansi';
import { registerMainCommand } from '../../src/cli/commands';
import { registerRulesCommand } from '../../src/cli/rules-command';

describe('main command', () => {
    let program: Command;
    let root: string;
    let logSpy: ReturnType<typeof vi.spyOn>;
    let errorSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
        program = new Command();
        root = mkdtempSync(path.join(tmpdir(), 'pystylelint-cli-'));
        vi.spyOn(process, 'cwd').mockReturnValue(root);
        vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
            throw new Error(`exit ${String(code)}`);
        });
        logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should have correct options', () => {
        registerMainCommand(program);
        const options = program.options.map(o => o.name());

        expect(options).toContain('verbose');
        expect(options).toContain('output');
        expect(options).toContain('config');
    });

    it('prints diagnostics and exits 1 when issues are found', async () => {
        writeFileSync(path.join(root, 'a.py'), 'x = 1;\n');
        registerMainCommand(program);

        await expect(program.parseAsync(['node', 'pystylelint', 'a.py'])).rejects.toThrow('exit 1');
        expect(logSpy.mock.calls).toEqual([['a.py: Line 1: S003 Unnecessary semicolon']]);
    });

    it('exits 0 for clean files', async () => {
        writeFileSync(path.join(root, 'clean.py'), 'value = 1\n');
        registerMainCommand(program);

        await expect(program.parseAsync(['node', 'pystylelint', '.'])).rejects.toThrow('exit 0');
        expect(logSpy).not.toHaveBeenCalled();
    });

    it('prints a summary in verbose mode', async () => {
        writeFileSync(path.join(root, 'a.py'), 'x = 1;\n');
        registerMainCommand(program);

        await expect(program.parseAsync(['node', 'pystylelint', '-v', 'a.py'])).rejects.toThrow('exit 1');
        const stderr = errorSpy.mock.calls.map((call) => stripAnsi(call.map(String).join(' ')));
        expect(stderr).toContain('✖ 1 issue in 1 file.');
    });

    it('writes JSON to stdout with --output json', async () => {
        writeFileSync(path.join(root, 'a.py'), 'class my_class:\n    pass\n');
        registerMainCommand(program);

        await expect(
            program.parseAsync(['node', 'pystylelint', '--output', 'json', 'a.py'])
        ).rejects.toThrow('exit 1');
        expect(logSpy).toHaveBeenCalledTimes(1);
        const doc: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
        expect(doc).toMatchObject({
            files: { 'a.py': { issues: [{ line: 1, code: 'S008', rule: 'class-name-camel-case' }] } },
            summary: { files: 1, issues: 1, failures: 0 },
        });
    });

    it('rejects an unknown output format', async () => {
        registerMainCommand(program);

        await expect(
            program.parseAsync(['node', 'pystylelint', '--output', 'xml', 'a.py'])
        ).rejects.toThrow('exit 1');
        expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(/^Error: Invalid CLI options/);
    });

    it('fails when no target files are found', async () => {
        registerMainCommand(program);

        await expect(program.parseAsync(['node', 'pystylelint', 'nothing/*.py'])).rejects.toThrow('exit 1');
        expect(errorSpy).toHaveBeenCalledWith('Error: no target files found to check.');
    });
});

describe('rules command', () => {
    let program: Command;

    beforeEach(() => {
        program = new Command();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should register rules command', () => {
        registerRulesCommand(program);
        const command = program.commands.find(c => c.name() === 'rules');
        expect(command).toBeDefined();
        expect(command?.description()).toContain('List the style checks');
    });

    it('prints one row per rule', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        registerRulesCommand(program);

        await program.parseAsync(['node', 'pystylelint', 'rules']);

        expect(logSpy).toHaveBeenCalledTimes(12);
        const first = stripAnsi(String(logSpy.mock.calls[0]?.[0]));
        expect(first).toBe(
            `S001  ${'too-long-line'.padEnd(32)}  lexical  Line is longer than 79 characters`
        );
    });
});
