import type RandomSource from "./RandomSource";
import InvalidConfigurationError from "../Error/InvalidConfigurationError";

const UINT32_MAX = 0xffffffff;

/**
 * mulberry32 generator. The 32-bit output is scaled by 2^32 - 1 rather than
 * 2^32 so that both ends of the requested range can be drawn.
 */
export default class SeededRandomSource implements RandomSource {
    private readonly seed: number;
    private state: number;
    private drawCount: number = 0;

    constructor(seed: number) {
        if (!Number.isInteger(seed) || seed < 0 || seed > UINT32_MAX) {
            throw new InvalidConfigurationError(`Seed must be an integer from 0 to ${UINT32_MAX}, got ${seed}`);
        }

        this.seed = seed;
        this.state = seed | 0;
    }

    public nextInRange(min: number, max: number): number
    {
        return min + (max - min) * (this.nextUint32() / UINT32_MAX);
    }

    public getSeed(): number
    {
        return this.seed;
    }

    public getDrawCount(): number
    {
        return this.drawCount;
    }

    private nextUint32(): number
    {
        ++this.drawCount;

        this.state = (this.state + 0x6d2b79f5) | 0;
        let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;

        return (t ^ (t >>> 14)) >>> 0;
    }
}
