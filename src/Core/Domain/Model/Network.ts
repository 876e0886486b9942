import Layer from "./Layer";
import Neuron from "./Neuron";
import { type LayerTopology, layerTopologySchema } from "./LayerTopology";
import { type NetworkDefinition, networkDefinitionSchema } from "./NetworkDefinition";
import type RandomSource from "../Random/RandomSource";
import InvalidTopologyError from "../Error/InvalidTopologyError";
import InvalidDefinitionError, { formatIssues } from "../Error/InvalidDefinitionError";
import { getLogger } from "../../Infrastructure/Logger";

export default class Network {
    private readonly layers: readonly Layer[];

    constructor(layers: readonly Layer[]) {
        if (layers.length === 0) {
            throw new InvalidTopologyError('Network needs at least one layer');
        }

        for (let i = 1; i < layers.length; ++i) {
            const expected = layers[i - 1].getNeurons().length;
            const actual = layers[i].getInputSize();

            // A layer without neurons accepts any input width.
            if (actual !== null && actual !== expected) {
                throw new InvalidTopologyError(
                    `Layer ${i} expects ${actual} inputs, layer ${i - 1} produces ${expected}`,
                );
            }
        }

        this.layers = [...layers];
    }

    public static random(random: RandomSource, topology: readonly LayerTopology[]): Network
    {
        if (topology.length < 2) {
            throw new InvalidTopologyError(
                `Topology needs at least 2 entries, got ${topology.length}`,
            );
        }

        topology.forEach((entry: LayerTopology, index: number) => {
            const result = layerTopologySchema.safeParse(entry);

            if (!result.success) {
                throw new InvalidTopologyError(
                    `Topology entry ${index} is invalid: ${formatIssues(result.error.issues)}`,
                );
            }
        });

        const layers: Layer[] = [];
        for (let i = 0; i < topology.length - 1; ++i) {
            layers.push(Layer.random(random, topology[i].neurons, topology[i + 1].neurons));
        }

        getLogger().debug(
            { topology: topology.map((entry: LayerTopology) => entry.neurons) },
            'random network constructed',
        );

        return new Network(layers);
    }

    public static fromDefinition(definition: unknown): Network
    {
        const result = networkDefinitionSchema.safeParse(definition);

        if (!result.success) {
            throw new InvalidDefinitionError(result.error.issues);
        }

        const network = new Network(result.data.layers.map((layer) => new Layer(
            layer.neurons.map((neuron) => new Neuron(neuron.bias, neuron.weights)),
        )));

        getLogger().debug({ topology: network.getTopology().map((entry) => entry.neurons) }, 'network defined');

        return network;
    }

    public propagate(inputs: readonly number[]): number[]
    {
        return this.layers.slice(1).reduce(
            (signals: number[], layer: Layer) => layer.propagate(signals),
            this.layers[0].propagate(inputs),
        );
    }

    public getLayers(): readonly Layer[]
    {
        return this.layers;
    }

    public getTopology(): LayerTopology[]
    {
        // An empty first layer takes any input; its width reads as 0.
        return [
            { neurons: this.layers[0].getInputSize() ?? 0 },
            ...this.layers.map((layer: Layer) => ({ neurons: layer.getNeurons().length })),
        ];
    }

    public toDefinition(): NetworkDefinition
    {
        return {
            layers: this.layers.map((layer: Layer) => ({
                neurons: layer.getNeurons().map((neuron: Neuron) => ({
                    bias: neuron.getBias(),
                    weights: [...neuron.getWeights()],
                })),
            })),
        };
    }
}
