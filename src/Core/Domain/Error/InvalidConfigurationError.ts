import NetworkError from "./NetworkError";

export default class InvalidConfigurationError extends NetworkError {
    constructor(message: string) {
        super(message, "INVALID_CONFIGURATION");
        this.name = "InvalidConfigurationError";
    }
}
