import { expect } from 'chai';
import { MintErrorCode } from '../src/core/errors';
import { Transactional, UnitOfWork } from '../src/core/unit-of-work';
import { captureError } from './fixtures';

class Counter implements Transactional<number> {
  value = 0;
  restored: string[];
  private name: string;

  constructor(name: string, restored: string[]) {
    this.name = name;
    this.restored = restored;
  }

  snapshot(): number {
    return this.value;
  }

  restore(snapshot: number): void {
    this.value = snapshot;
    this.restored.push(this.name);
  }
}

describe('UnitOfWork', function () {
  let order: string[];
  let first: Counter;
  let second: Counter;
  let unit: UnitOfWork;

  beforeEach(() => {
    order = [];
    first = new Counter('first', order);
    second = new Counter('second', order);
    unit = new UnitOfWork([first, second]);
  });

  it('keeps changes and returns the result on success', () => {
    const result = unit.run(() => {
      first.value = 5;
      second.value = 6;
      return 'done';
    });

    expect(result).to.equal('done');
    expect([first.value, second.value]).to.deep.equal([5, 6]);
    expect(order).to.deep.equal([]);
  });

  it('restores every participant in reverse order and rethrows', () => {
    const failure = new Error('boom');

    const error = captureError(() =>
      unit.run(() => {
        first.value = 5;
        second.value = 6;
        throw failure;
      })
    );

    expect(error).to.equal(failure);
    expect([first.value, second.value]).to.deep.equal([0, 0]);
    expect(order).to.deep.equal(['second', 'first']);
  });

  it('rejects nested runs and releases the flag afterwards', () => {
    let nested: unknown;
    unit.run(() => {
      expect(unit.inProgress).to.equal(true);
      nested = captureError(() => unit.run(() => undefined));
    });

    expect(nested).to.have.property('code', MintErrorCode.REENTRANT);
    expect(unit.inProgress).to.equal(false);
    expect(unit.run(() => 1)).to.equal(1);
  });

  it('releases the flag after a failure', () => {
    captureError(() =>
      unit.run(() => {
        throw new Error('boom');
      })
    );

    expect(unit.inProgress).to.equal(false);
  });
});
