import { z } from "zod";
import InvalidTopologyError from "../Error/InvalidTopologyError";
import { formatIssues } from "../Error/InvalidDefinitionError";

const layerWidthSchema = z.number().int().nonnegative();

export const layerTopologySchema = z.object({
    neurons: layerWidthSchema,
});

/** Width of one layer, consumed once while a network is built. */
export type LayerTopology = z.infer<typeof layerTopologySchema>;

export function assertLayerWidth(width: number, label: string): void
{
    const result = layerWidthSchema.safeParse(width);

    if (!result.success) {
        throw new InvalidTopologyError(`${label} is invalid: ${formatIssues(result.error.issues)}`);
    }
}
