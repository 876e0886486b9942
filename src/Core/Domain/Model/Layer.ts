import Neuron from "./Neuron";
import type RandomSource from "../Random/RandomSource";
import InvalidTopologyError from "../Error/InvalidTopologyError";
import { assertLayerWidth } from "./LayerTopology";

export default class Layer {
    private readonly neurons: readonly Neuron[];

    constructor(neurons: readonly Neuron[]) {
        const inputSize = neurons.length > 0 ? neurons[0].getInputSize() : null;

        neurons.forEach((neuron: Neuron, index: number) => {
            if (neuron.getInputSize() !== inputSize) {
                throw new InvalidTopologyError(
                    `Neuron ${index} expects ${neuron.getInputSize()} inputs, layer expects ${inputSize}`,
                );
            }
        });

        this.neurons = [...neurons];
    }

    public static random(random: RandomSource, inputNeurons: number, outputNeurons: number): Layer
    {
        assertLayerWidth(inputNeurons, 'Layer input size');
        assertLayerWidth(outputNeurons, 'Layer output size');

        const neurons: Neuron[] = [];

        for (let i = 0; i < outputNeurons; ++i) {
            neurons.push(Neuron.random(random, inputNeurons));
        }

        return new Layer(neurons);
    }

    public propagate(inputs: readonly number[]): number[]
    {
        return this.neurons.map((neuron: Neuron) => neuron.propagate(inputs));
    }

    public getNeurons(): readonly Neuron[]
    {
        return this.neurons;
    }

    public getInputSize(): number | null
    {
        return this.neurons.length > 0 ? this.neurons[0].getInputSize() : null;
    }
}
