import ActivationFunction from "./ActivationFunction/ActivationFunction";
import ReluActivationFunction from "./ActivationFunction/ReluActivationFunction";
import TransferFunction from "./TransferFunction/TransferFunction";
import SumTransferFunction from "./TransferFunction/SumTransferFunction";
import type RandomSource from "../Random/RandomSource";
import DimensionMismatchError from "../Error/DimensionMismatchError";
import { assertLayerWidth } from "./LayerTopology";

const INITIAL_VALUE_MIN = -1.0;
const INITIAL_VALUE_MAX = 1.0;

export default class Neuron {
    private readonly bias: number;
    private readonly weights: readonly number[];
    private readonly activationFunction: ActivationFunction;
    private readonly transferFunction: TransferFunction;

    constructor(
        bias: number,
        weights: readonly number[],
        activationFunction: ActivationFunction = new ReluActivationFunction(),
        transferFunction: TransferFunction = new SumTransferFunction(),
    ) {
        this.bias = Math.fround(bias);
        this.weights = weights.map((weight) => Math.fround(weight));
        this.activationFunction = activationFunction;
        this.transferFunction = transferFunction;
    }

    /**
     * Bias first, then one weight per input in index order: exactly
     * `1 + inputSize` draws from `random`.
     */
    public static random(random: RandomSource, inputSize: number): Neuron
    {
        assertLayerWidth(inputSize, 'Neuron input size');

        const bias = random.nextInRange(INITIAL_VALUE_MIN, INITIAL_VALUE_MAX);

        const weights: number[] = [];
        for (let i = 0; i < inputSize; ++i) {
            weights.push(random.nextInRange(INITIAL_VALUE_MIN, INITIAL_VALUE_MAX));
        }

        return new Neuron(bias, weights);
    }

    public propagate(inputs: readonly number[]): number
    {
        if (inputs.length !== this.weights.length) {
            throw new DimensionMismatchError(this.weights.length, inputs.length);
        }

        // Strict index order; the float32 result depends on it.
        let output = 0.0;
        for (let i = 0; i < inputs.length; ++i) {
            const signal = Math.fround(Math.fround(inputs[i]) * this.weights[i]);
            output = this.transferFunction.transfer(output, signal);
        }

        return this.activationFunction.activate(Math.fround(this.bias + output));
    }

    public getBias(): number
    {
        return this.bias;
    }

    public getWeights(): readonly number[]
    {
        return this.weights;
    }

    public getInputSize(): number
    {
        return this.weights.length;
    }
}
