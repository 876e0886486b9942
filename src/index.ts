export { default as Network } from "./Core/Domain/Model/Network";
export { default as Layer } from "./Core/Domain/Model/Layer";
export { default as Neuron } from "./Core/Domain/Model/Neuron";
export type { LayerTopology } from "./Core/Domain/Model/LayerTopology";
export { layerTopologySchema } from "./Core/Domain/Model/LayerTopology";
export type {
    NetworkDefinition,
    LayerDefinition,
    NeuronDefinition,
} from "./Core/Domain/Model/NetworkDefinition";
export { networkDefinitionSchema } from "./Core/Domain/Model/NetworkDefinition";
export { default as ActivationFunction } from "./Core/Domain/Model/ActivationFunction/ActivationFunction";
export { default as ReluActivationFunction } from "./Core/Domain/Model/ActivationFunction/ReluActivationFunction";
export { default as TransferFunction } from "./Core/Domain/Model/TransferFunction/TransferFunction";
export { default as SumTransferFunction } from "./Core/Domain/Model/TransferFunction/SumTransferFunction";
export type { default as RandomSource } from "./Core/Domain/Random/RandomSource";
export { default as SeededRandomSource } from "./Core/Domain/Random/SeededRandomSource";
export { default as NetworkError } from "./Core/Domain/Error/NetworkError";
export type { NetworkErrorCode } from "./Core/Domain/Error/NetworkError";
export { default as DimensionMismatchError } from "./Core/Domain/Error/DimensionMismatchError";
export { default as InvalidTopologyError } from "./Core/Domain/Error/InvalidTopologyError";
export { default as InvalidDefinitionError } from "./Core/Domain/Error/InvalidDefinitionError";
export { default as InvalidConfigurationError } from "./Core/Domain/Error/InvalidConfigurationError";
export type { Config, LogLevel } from "./Core/Infrastructure/Config";
export { loadConfig } from "./Core/Infrastructure/Config";
export { createLogger, getLogger, setLogger } from "./Core/Infrastructure/Logger";
