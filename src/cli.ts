/**
 * Command-line front end.
 *
 *   compress   <grid.json> [-o out] [--preset raw|balanced|max_ratio] [--text] [--password pw]
 *   decompress <file>      [-o grid.json] [--password pw]
 *   inspect    <file>
 *
 * Grid files are JSON documents of the form { "shape": [...], "grid": [...] }.
 * The password may also come from the VQH_PASSWORD environment variable.
 */
import { readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { IndexGrid } from './vqh-types.js';
import type { CompressionPreset, VqhLogger } from './vqh/types.js';
import { COMPRESSION_PRESETS } from './vqh/types.js';
import { VqhEncoder } from './vqh/encode.js';
import { VqhDecoder } from './vqh/decode.js';
import { isValidShape } from './vqh/grid.js';
import { VqhError } from './vqh/errors.js';

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    env: Record<string, string | undefined>;
}

export const PASSWORD_ENV = 'VQH_PASSWORD';

const USAGE = [
    'Usage: vqh <command> [options]',
    '',
    '  compress   <grid.json> [-o out] [--preset raw|balanced|max_ratio] [--text] [--password pw]',
    '  decompress <file> [-o grid.json] [--password pw]',
    '  inspect    <file>',
].join('\n');

interface ParsedArgs {
    positional: string[];
    flags: Map<string, string | true>;
}

const VALUE_FLAGS = new Set(['o', 'output', 'preset', 'password']);

function parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const flags = new Map<string, string | true>();
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (!arg.startsWith('-') || arg === '-') {
            positional.push(arg);
            continue;
        }
        const name = arg.replace(/^--?/, '');
        if (VALUE_FLAGS.has(name)) {
            const value = args[i + 1];
            if (value === undefined) throw new VqhError(`Option ${arg} needs a value`);
            flags.set(name, value);
            i++;
        } else {
            flags.set(name, true);
        }
    }
    return { positional, flags };
}

function stringFlag(parsed: ParsedArgs, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = parsed.flags.get(name);
        if (typeof value === 'string') return value;
    }
    return undefined;
}

function isPreset(value: string): value is CompressionPreset {
    return Object.prototype.hasOwnProperty.call(COMPRESSION_PRESETS, value);
}

function isIndexGrid(value: unknown): value is IndexGrid {
    return Array.isArray(value)
        && value.every((entry: unknown) => typeof entry === 'number' || isIndexGrid(entry));
}

function replaceExtension(file: string, ext: string): string {
    const base = file.replace(/\.vqh(\.json)?$/, '');
    const parsed = path.parse(base);
    return path.join(parsed.dir, (base === file ? parsed.name : parsed.base) + ext);
}

async function readGridFile(file: string): Promise<{ grid: IndexGrid; shape: number[] }> {
    let doc: unknown;
    try {
        doc = JSON.parse(await readFile(file, 'utf8'));
    } catch (err) {
        throw new VqhError(`Cannot read grid file ${file}: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    if (typeof doc !== 'object' || doc === null || !('shape' in doc) || !('grid' in doc)) {
        throw new VqhError(`Grid file ${file} must contain "shape" and "grid"`);
    }
    const { shape, grid } = doc;
    if (!isValidShape(shape)) throw new VqhError(`Grid file ${file}: "shape" must be an array of positive integers`);
    if (!isIndexGrid(grid)) throw new VqhError(`Grid file ${file}: "grid" must be nested arrays of integers`);
    return { grid, shape };
}

async function compressCommand(parsed: ParsedArgs, io: CliIO, logger: VqhLogger): Promise<void> {
    const input = parsed.positional[1];
    if (!input) throw new VqhError('compress: missing <grid.json>');

    const preset = stringFlag(parsed, 'preset') ?? 'raw';
    if (!isPreset(preset)) throw new VqhError(`compress: unknown preset "${preset}"`);
    const text = parsed.flags.has('text');

    const { grid, shape } = await readGridFile(input);
    const encoder = new VqhEncoder({
        preset,
        format: text ? 'text' : 'binary',
        password: stringFlag(parsed, 'password') ?? io.env[PASSWORD_ENV],
        logger,
    });
    const bytes = await encoder.encodeGrid(grid, shape);

    const output = stringFlag(parsed, 'o', 'output') ?? replaceExtension(input, text ? '.vqh.json' : '.vqh');
    await writeFile(output, bytes);

    const stats = encoder.getTelemetry()?.stats;
    io.stdout(`Compressed ${input} -> ${output} (${bytes.length} bytes)`);
    if (stats) {
        io.stdout(`  ${stats.symbolCount} symbols, ${stats.distinctSymbols} distinct, ` +
            `${stats.averageCodeLength.toFixed(3)} bits/symbol (entropy ${stats.entropyBits.toFixed(3)})`);
    }
}

async function decompressCommand(parsed: ParsedArgs, io: CliIO, logger: VqhLogger): Promise<void> {
    const input = parsed.positional[1];
    if (!input) throw new VqhError('decompress: missing <file>');

    const decoder = new VqhDecoder(new Uint8Array(await readFile(input)), {
        password: stringFlag(parsed, 'password') ?? io.env[PASSWORD_ENV],
        logger,
    });
    const { grid, shape } = await decoder.getGrid();

    const output = stringFlag(parsed, 'o', 'output') ?? replaceExtension(input, '.grid.json');
    await writeFile(output, JSON.stringify({ shape, grid }) + '\n', 'utf8');
    io.stdout(`Decompressed ${input} -> ${output} (shape [${shape.join(', ')}])`);
}

async function inspectCommand(parsed: ParsedArgs, io: CliIO): Promise<void> {
    const input = parsed.positional[1];
    if (!input) throw new VqhError('inspect: missing <file>');

    const decoder = new VqhDecoder(new Uint8Array(await readFile(input)));
    const summary = decoder.inspect();
    const rows: Array<[string, string]> = [
        ['format', summary.format],
        ['version', String(summary.version)],
        ['outer_codec', summary.outerCodec],
        ['encrypted', String(summary.encrypted)],
        ['shape', `[${summary.shape.join(', ')}]`],
        ['symbol_count', String(summary.symbolCount)],
        ['distinct_symbols', String(summary.distinctSymbols)],
        ['max_code_length', String(summary.maxCodeLength)],
        ['bit_length', String(summary.bitLength)],
        ['payload_bytes', String(summary.payloadLength)],
    ];
    const width = Math.max(...rows.map(([k]) => k.length));
    for (const [key, value] of rows) io.stdout(`${key.padEnd(width)}  ${value}`);
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
    const logger: VqhLogger = {
        warn: (msg) => io.stderr(msg),
        error: (msg) => io.stderr(msg),
    };
    try {
        const parsed = parseArgs(args);
        switch (parsed.positional[0]) {
            case 'compress':
                await compressCommand(parsed, io, logger);
                return 0;
            case 'decompress':
                await decompressCommand(parsed, io, logger);
                return 0;
            case 'inspect':
                await inspectCommand(parsed, io);
                return 0;
            default:
                io.stderr(USAGE);
                return parsed.positional.length === 0 && parsed.flags.has('help') ? 0 : 1;
        }
    } catch (err: unknown) {
        io.stderr(`Error: ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`);
        return 1;
    }
}
