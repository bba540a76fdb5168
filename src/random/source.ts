import { randomInt } from 'crypto';
import { createConfigurationError } from '../types/index.js';

/**
 * Source of uniform random draws. Owned by a single campaign.
 */
export interface RandomSource {
    /** Seed this source was created from; replaying it replays every draw */
    readonly seed: number;
    /** Float in [0, 1) */
    next(): number;
    /** Integer in [min, max], both inclusive */
    nextIntInRange(min: number, max: number): number;
    nextBool(): boolean;
}

// ─────────────────────────────────────────────────────────────────
// mulberry32
// ─────────────────────────────────────────────────────────────────

export class Mulberry32Source implements RandomSource {
    readonly seed: number;
    private state: number;

    constructor(seed: number) {
        if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
            throw createConfigurationError(`Seed must be an unsigned 32-bit integer, got ${seed}`);
        }
        this.seed = seed;
        this.state = this.seed;
    }

    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    nextIntInRange(min: number, max: number): number {
        if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
            throw createConfigurationError(`Invalid integer range [${min}, ${max}]`);
        }
        return min + Math.floor(this.next() * (max - min + 1));
    }

    nextBool(): boolean {
        return this.next() < 0.5;
    }
}

/**
 * Create a seeded source. Without a seed one is drawn from system entropy.
 */
export function createRandomSource(seed?: number): RandomSource {
    return new Mulberry32Source(seed ?? randomInt(0, 0x100000000));
}

/**
 * Pick one element uniformly.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw createConfigurationError('Cannot pick from an empty list');
    }
    return items[random.nextIntInRange(0, items.length - 1)];
}
