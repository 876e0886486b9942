import TransferFunction from "./TransferFunction";

export default class SumTransferFunction extends TransferFunction
{
    transfer(accumulatedValue: number, signalValue: number): number {
        return Math.fround(accumulatedValue + signalValue);
    }
}
