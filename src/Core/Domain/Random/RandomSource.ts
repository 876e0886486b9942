export default interface RandomSource {
    /** One sample from [min, max], both bounds inclusive. */
    nextInRange(min: number, max: number): number;
}
