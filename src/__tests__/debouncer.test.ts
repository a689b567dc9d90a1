import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { Debouncer } from '../dispatcher/debouncer';
import { FakeClock } from './helpers/fake-clock';

describe('Debouncer', () => {
  it('accepts the first press and rejects repeats inside the window', async () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(100, clock);
    assert.equal(debouncer.accept(20), true);
    await clock.advance(99);
    assert.equal(debouncer.accept(20), false);
    await clock.advance(1);
    assert.equal(debouncer.accept(20), true);
  });

  it('does not extend the window on rejected repeats', async () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(100, clock);
    debouncer.accept(20);
    await clock.advance(60);
    assert.equal(debouncer.accept(20), false);
    await clock.advance(40);
    assert.equal(debouncer.accept(20), true);
  });

  it('keeps a separate window per source code', () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(100, clock);
    assert.equal(debouncer.accept(20), true);
    assert.equal(debouncer.accept(21), true);
    assert.equal(debouncer.accept(20), false);
  });

  it('accepts everything when the window is 0', () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(0, clock);
    assert.equal(debouncer.accept(20), true);
    assert.equal(debouncer.accept(20), true);
  });

  it('reset() forgets previous presses', () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(100, clock);
    debouncer.accept(20);
    debouncer.reset();
    assert.equal(debouncer.accept(20), true);
  });

  it('measures the window from the arrival time it is given', async () => {
    const clock = new FakeClock();
    const debouncer = new Debouncer(100, clock);
    assert.equal(debouncer.accept(23, 0), true);
    await clock.advance(160);
    assert.equal(debouncer.accept(23, 0), false);
    assert.equal(debouncer.accept(23, 100), true);
  });
});
