import ActivationFunction from "./ActivationFunction";

export default class ReluActivationFunction extends ActivationFunction
{
    // NaN and -0.0 both clamp to 0.0
    activate(value: number): number {
        return value > 0.0 ? value : 0.0;
    }
}
