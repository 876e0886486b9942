import {expect} from "chai";
import Neuron from "../../../../src/Core/Domain/Model/Neuron";
import ActivationFunction from "../../../../src/Core/Domain/Model/ActivationFunction/ActivationFunction";
import SeededRandomSource from "../../../../src/Core/Domain/Random/SeededRandomSource";
import DimensionMismatchError from "../../../../src/Core/Domain/Error/DimensionMismatchError";
import InvalidTopologyError from "../../../../src/Core/Domain/Error/InvalidTopologyError";
import ScriptedRandomSource from "../../../Support/ScriptedRandomSource";

const f = Math.fround;

class IdentityActivationFunction extends ActivationFunction {
  activate(value: number): number {
    return value;
  }
}

describe('Neuron', function() {
  it('should clamp negative activation to zero', function() {
    const neuron = new Neuron(0.5, [-0.3, 0.8]);

    expect(neuron.propagate([-10.0, -10.0])).to.equal(0.0);
  });

  it('should add weighted inputs to bias', function() {
    const neuron = new Neuron(0.5, [-0.3, 0.8]);

    const output = neuron.propagate([0.5, 1.0]);

    expect(output).to.be.closeTo((-0.3 * 0.5) + (0.8 * 1.0) + 0.5, 1e-6);
    expect(output).to.equal(f(f(0.5) + f(f(0.5 * f(-0.3)) + f(1.0 * f(0.8)))));
  });

  it('should output bias alone when it has no inputs', function() {
    expect(new Neuron(0.25, []).propagate([])).to.equal(0.25);
  });

  it('should round inputs to single precision before weighting them', function() {
    const weight = f(0.012833);
    const neuron = new Neuron(0.0, [weight]);
    const input = 0.013039117352056168;

    expect(input).to.not.equal(f(input));
    expect(neuron.propagate([input])).to.equal(f(f(input) * weight));
  });

  it('should treat any input like its single precision value', function() {
    const random = new SeededRandomSource(31);
    const neuron = new Neuron(0.1, [0.7, 0.3, 0.9]);

    for (let i = 0; i < 100; ++i) {
      const inputs = [0, 1, 2].map(() => random.nextInRange(0.0, 1.0));

      expect(neuron.propagate(inputs)).to.equal(neuron.propagate(inputs.map(f)));
    }
  });

  it('should store bias and weights in single precision', function() {
    const neuron = new Neuron(0.1, [0.2, 0.3]);

    expect(neuron.getBias()).to.equal(f(0.1));
    expect(neuron.getWeights()).to.deep.equal([f(0.2), f(0.3)]);
    expect(neuron.getInputSize()).to.equal(2);
  });

  it('should use the given activation function', function() {
    const neuron = new Neuron(0.5, [-0.3, 0.8], new IdentityActivationFunction());

    expect(neuron.propagate([-10.0, -10.0])).to.be.closeTo(-4.5, 1e-5);
  });

  it('should reject inputs of the wrong length', function() {
    const neuron = new Neuron(0.5, [-0.3, 0.8]);

    expect(() => neuron.propagate([1.0, 2.0, 3.0]))
      .to.throw(DimensionMismatchError)
      .that.includes({ expected: 2, actual: 3 });
    expect(() => neuron.propagate([])).to.throw(DimensionMismatchError);
  });

  it('should never output a negative value', function() {
    const random = new SeededRandomSource(7);

    for (let i = 0; i < 50; ++i) {
      const neuron = Neuron.random(random, 4);
      const inputs = [0, 1, 2, 3].map(() => random.nextInRange(-10.0, 10.0));

      expect(neuron.propagate(inputs)).to.be.at.least(0.0);
    }
  });

  it('should draw bias before weights', function() {
    const random = new ScriptedRandomSource([0.1, 0.2, 0.3, 0.4, 0.5]);

    const neuron = Neuron.random(random, 4);

    expect(neuron.getBias()).to.equal(f(0.1));
    expect(neuron.getWeights()).to.deep.equal([f(0.2), f(0.3), f(0.4), f(0.5)]);
    expect(random.getDrawCount()).to.equal(5);
    expect(random.getRanges().every(([min, max]) => min === -1.0 && max === 1.0)).to.equal(true);
  });

  it('should reject a negative or fractional input size before drawing', function() {
    const random = new ScriptedRandomSource([0.1, 0.2]);

    expect(() => Neuron.random(random, -1)).to.throw(InvalidTopologyError, 'Neuron input size is invalid');
    expect(() => Neuron.random(random, 1.5)).to.throw(InvalidTopologyError, 'Neuron input size is invalid');
    expect(random.getDrawCount()).to.equal(0);
  });

  it('should reproduce the same neuron from the same seed', function() {
    const first = Neuron.random(new SeededRandomSource(1234), 3);
    const second = Neuron.random(new SeededRandomSource(1234), 3);

    expect(second.getBias()).to.equal(first.getBias());
    expect(second.getWeights()).to.deep.equal(first.getWeights());
  });
});
