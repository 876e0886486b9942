export type NetworkErrorCode =
    | "DIMENSION_MISMATCH"
    | "INVALID_TOPOLOGY"
    | "INVALID_DEFINITION"
    | "INVALID_CONFIGURATION";

export default class NetworkError extends Error {
    readonly code: NetworkErrorCode;

    constructor(message: string, code: NetworkErrorCode) {
        super(message);
        this.name = "NetworkError";
        this.code = code;
    }
}
