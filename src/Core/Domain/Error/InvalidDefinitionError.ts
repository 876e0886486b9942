import type { ZodIssue } from "zod";
import NetworkError from "./NetworkError";

export default class InvalidDefinitionError extends NetworkError {
    readonly issues: ZodIssue[];

    constructor(issues: ZodIssue[]) {
        super(`Invalid network definition: ${formatIssues(issues)}`, "INVALID_DEFINITION");
        this.name = "InvalidDefinitionError";
        this.issues = issues;
    }
}

export function formatIssues(issues: ZodIssue[]): string
{
    return issues
        .map((issue) => issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)
        .join("; ");
}
