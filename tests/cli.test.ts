import { describe, it, expect, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { runCli, PASSWORD_ENV, type CliIO } from '../src/cli.js';

interface CapturedIO extends CliIO {
    out: string[];
    err: string[];
}

function captureIO(env: Record<string, string | undefined> = {}): CapturedIO {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        env,
        stdout: (line) => out.push(line),
        stderr: (line) => err.push(line),
    };
}

const GRID_DOC = { shape: [1, 2, 3], grid: [[[0, 0, 1], [1, 2, 0]]] };

describe('vqh CLI', () => {
    let dir: string;
    let gridFile: string;

    beforeEach(() => {
        const root = process.env.DATA_ROOT ?? fs.mkdtempSync('vqh-cli-');
        dir = fs.mkdtempSync(path.join(root, 'cli-'));
        gridFile = path.join(dir, 'grid.json');
        fs.writeFileSync(gridFile, JSON.stringify(GRID_DOC));
    });

    it('compresses, inspects and decompresses a grid file', async () => {
        const compressIO = captureIO();
        expect(await runCli(['compress', gridFile], compressIO)).toBe(0);

        const container = path.join(dir, 'grid.vqh');
        const size = fs.statSync(container).size;
        expect(compressIO.out).toEqual([
            `Compressed ${gridFile} -> ${container} (${size} bytes)`,
            '  6 symbols, 3 distinct, 1.500 bits/symbol (entropy 1.459)',
        ]);

        const inspectIO = captureIO();
        expect(await runCli(['inspect', container], inspectIO)).toBe(0);
        expect(inspectIO.out).toEqual([
            'format            binary',
            'version           1',
            'outer_codec       none',
            'encrypted         false',
            'shape             [1, 2, 3]',
            'symbol_count      6',
            'distinct_symbols  3',
            'max_code_length   2',
            'bit_length        9',
            'payload_bytes     2',
        ]);

        const restored = path.join(dir, 'restored.json');
        const decompressIO = captureIO();
        expect(await runCli(['decompress', container, '-o', restored], decompressIO)).toBe(0);
        expect(decompressIO.out).toEqual([`Decompressed ${container} -> ${restored} (shape [1, 2, 3])`]);
        expect(JSON.parse(fs.readFileSync(restored, 'utf8'))).toEqual(GRID_DOC);
    });

    it('writes text containers with --text and a preset', async () => {
        const io = captureIO();
        expect(await runCli(['compress', gridFile, '--text', '--preset', 'balanced'], io)).toBe(0);

        const container = path.join(dir, 'grid.vqh.json');
        const doc = JSON.parse(fs.readFileSync(container, 'utf8'));
        expect(doc.format).toBe('vqh');
        expect(doc.outer_codec).toBe('zstd');

        expect(await runCli(['decompress', container], captureIO())).toBe(0);
        const restored = JSON.parse(fs.readFileSync(path.join(dir, 'grid.grid.json'), 'utf8'));
        expect(restored).toEqual(GRID_DOC);
    });

    it('reads the password from the environment', async () => {
        const env = { [PASSWORD_ENV]: 'test-secret' };
        const out = path.join(dir, 'secret.vqh');
        expect(await runCli(['compress', gridFile, '-o', out], captureIO(env))).toBe(0);

        const inspectIO = captureIO();
        await runCli(['inspect', out], inspectIO);
        expect(inspectIO.out).toContain('encrypted         true');

        const noPassword = captureIO();
        expect(await runCli(['decompress', out], noPassword)).toBe(1);
        expect(noPassword.err).toEqual(['Error: IntegrityError: Container is encrypted; a password is required']);

        expect(await runCli(['decompress', out, '--password', 'test-secret'], captureIO())).toBe(0);
    });

    it('reports errors on stderr with exit code 1', async () => {
        const missing = captureIO();
        expect(await runCli(['compress', path.join(dir, 'nope.json')], missing)).toBe(1);
        expect(missing.err).toHaveLength(1);
        expect(missing.err[0]).toMatch(/^Error: VqhError: Cannot read grid file /);

        const badPreset = captureIO();
        expect(await runCli(['compress', gridFile, '--preset', 'ultra'], badPreset)).toBe(1);
        expect(badPreset.err).toEqual(['Error: VqhError: compress: unknown preset "ultra"']);

        const noValue = captureIO();
        expect(await runCli(['decompress', gridFile, '-o'], noValue)).toBe(1);
        expect(noValue.err).toEqual(['Error: VqhError: Option -o needs a value']);

        fs.writeFileSync(gridFile, JSON.stringify({ shape: [2], grid: [1, 2, 3] }));
        const mismatch = captureIO();
        expect(await runCli(['compress', gridFile], mismatch)).toBe(1);
        expect(mismatch.err).toEqual([
            'Error: ShapeMismatchError: Grid dimension 0 has the wrong length (expected 2, got 3)',
        ]);
    });

    it('prints usage for unknown commands', async () => {
        const io = captureIO();
        expect(await runCli(['explode'], io)).toBe(1);
        expect(io.err[0].startsWith('Usage: vqh <command> [options]')).toBe(true);

        expect(await runCli(['--help'], captureIO())).toBe(0);
    });
});
