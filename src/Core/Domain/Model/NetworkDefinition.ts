import { z } from "zod";

const finiteNumber = z.number().finite();

export const neuronDefinitionSchema = z.object({
    bias: finiteNumber,
    weights: z.array(finiteNumber),
});

export const layerDefinitionSchema = z.object({
    neurons: z.array(neuronDefinitionSchema),
});

export const networkDefinitionSchema = z.object({
    layers: z.array(layerDefinitionSchema).min(1),
});

export type NeuronDefinition = z.infer<typeof neuronDefinitionSchema>;
export type LayerDefinition = z.infer<typeof layerDefinitionSchema>;
export type NetworkDefinition = z.infer<typeof networkDefinitionSchema>;
