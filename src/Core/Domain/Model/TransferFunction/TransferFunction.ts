export default abstract class TransferFunction
{
    public abstract transfer(accumulatedValue: number, signalValue: number): number;
}
