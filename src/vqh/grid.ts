/**
 * Row-major flatten/reshape between nested index grids and flat symbol arrays.
 * The last dimension varies fastest, matching the order the model emits.
 */
import type { IndexGrid, Shape, VqSymbol } from '../vqh-types.js';
import { ShapeMismatchError } from './errors.js';

export function isValidShape(shape: unknown): shape is number[] {
    return Array.isArray(shape)
        && shape.length > 0
        && shape.every((d: unknown) => typeof d === 'number' && Number.isSafeInteger(d) && d > 0);
}

export function shapeSize(shape: Shape): number {
    return shape.reduce((acc, d) => acc * d, 1);
}

function assertShape(shape: Shape): void {
    if (!isValidShape(shape)) {
        throw new ShapeMismatchError(`Shape [${shape.join(', ')}] must list positive integer dimensions`, 1, 0);
    }
}

export function flattenGrid(grid: IndexGrid, shape: Shape): VqSymbol[] {
    assertShape(shape);
    const out: VqSymbol[] = [];

    const walk = (level: IndexGrid, depth: number): void => {
        if (level.length !== shape[depth]) {
            throw new ShapeMismatchError(`Grid dimension ${depth} has the wrong length`, shape[depth], level.length);
        }
        const leafLevel = depth === shape.length - 1;
        for (const entry of level) {
            if (leafLevel) {
                if (typeof entry !== 'number') {
                    throw new ShapeMismatchError(`Grid is nested deeper than its shape`, shape.length, shape.length + 1);
                }
                out.push(entry);
            } else {
                if (typeof entry === 'number') {
                    throw new ShapeMismatchError(`Grid is shallower than its shape`, shape.length, depth + 1);
                }
                walk(entry, depth + 1);
            }
        }
    };

    walk(grid, 0);
    return out;
}

export function reshapeSymbols(symbols: readonly VqSymbol[], shape: Shape): IndexGrid {
    assertShape(shape);
    const expected = shapeSize(shape);
    if (symbols.length !== expected) {
        throw new ShapeMismatchError('Symbol count does not match the product of the shape', expected, symbols.length);
    }

    let cursor = 0;
    const build = (depth: number): IndexGrid => {
        const dim = shape[depth];
        if (depth === shape.length - 1) {
            const row = symbols.slice(cursor, cursor + dim);
            cursor += dim;
            return row;
        }
        const level: IndexGrid[] = [];
        for (let i = 0; i < dim; i++) level.push(build(depth + 1));
        return level;
    };
    return build(0);
}
