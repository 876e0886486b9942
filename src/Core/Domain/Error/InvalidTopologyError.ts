import NetworkError from "./NetworkError";

export default class InvalidTopologyError extends NetworkError {
    constructor(message: string) {
        super(message, "INVALID_TOPOLOGY");
        this.name = "InvalidTopologyError";
    }
}
