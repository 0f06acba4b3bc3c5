import { expect } from "chai";
import { describe, it } from "mocha";

import { GrowableSeriesQueue } from "../../../engine/components/GrowableSeriesQueue.js";
import { createSeriesQueue } from "../../../engine/components/queueFactory.js";
import { RingSeriesQueue } from "../../../engine/components/RingSeriesQueue.js";
import { QueueExhaustedError } from "../../../engine/errors.js";

describe("RingSeriesQueue", () => {
  it("returns values in arrival order", () => {
    const queue = new RingSeriesQueue(4);
    queue.push(1.5);
    queue.push(2.5);
    queue.push(3.5);

    expect(queue.pop()).to.equal(1.5);
    expect(queue.pop()).to.equal(2.5);
    expect(queue.pop()).to.equal(3.5);
    expect(queue.pop()).to.be.undefined;
  });

  it("rejects a push beyond capacity and keeps the earlier values", () => {
    const queue = new RingSeriesQueue(2);
    expect(queue.push(1)).to.deep.equal({ accepted: true });
    expect(queue.push(2)).to.deep.equal({ accepted: true });

    const result = queue.push(3);

    expect(result).to.deep.equal({ accepted: false, overflow: { capacity: 2, value: 3 } });
    expect(queue.toArray()).to.deep.equal([1, 2]);
    expect(queue.isFull()).to.be.true;
  });

  it("accepts again once a value has been popped", () => {
    const queue = new RingSeriesQueue(2);
    queue.push(1);
    queue.push(2);
    queue.pop();

    expect(queue.push(3).accepted).to.be.true;
    expect(queue.toArray()).to.deep.equal([2, 3]);
  });

  it("keeps order across the wrap-around point", () => {
    const queue = new RingSeriesQueue(3);
    for (let round = 0; round < 5; round++) {
      queue.push(round * 10);
      queue.push(round * 10 + 1);
      expect(queue.pop()).to.equal(round * 10);
      expect(queue.pop()).to.equal(round * 10 + 1);
    }
    expect(queue.isEmpty()).to.be.true;
  });

  it("peeks without removing", () => {
    const queue = new RingSeriesQueue(2);
    expect(queue.peek()).to.be.undefined;
    queue.push(7);
    expect(queue.peek()).to.equal(7);
    expect(queue.size()).to.equal(1);
  });

  it("clear empties the queue and leaves it usable", () => {
    const queue = new RingSeriesQueue(2);
    queue.push(1);
    queue.push(2);
    queue.clear();

    expect(queue.size()).to.equal(0);
    expect(queue.pop()).to.be.undefined;
    expect(queue.push(9).accepted).to.be.true;
    expect(queue.toArray()).to.deep.equal([9]);
  });

  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new RingSeriesQueue(0)).to.throw(RangeError, "got 0");
    expect(() => new RingSeriesQueue(2.5)).to.throw(RangeError);
  });
});

describe("GrowableSeriesQueue", () => {
  it("never rejects a push and doubles its storage", () => {
    const queue = new GrowableSeriesQueue({ initialCapacity: 2 });
    for (let i = 0; i < 5; i++) {
      expect(queue.push(i).accepted).to.be.true;
    }

    expect(queue.capacity).to.equal(8);
    expect(queue.toArray()).to.deep.equal([0, 1, 2, 3, 4]);
  });

  it("keeps order when growing from a wrapped ring", () => {
    const queue = new GrowableSeriesQueue({ initialCapacity: 4 });
    queue.push(1);
    queue.push(2);
    queue.push(3);
    queue.pop();
    queue.pop();
    queue.push(4);
    queue.push(5);
    queue.push(6);
    queue.push(7);

    expect(queue.capacity).to.equal(8);
    expect(queue.toArray()).to.deep.equal([3, 4, 5, 6, 7]);
  });

  it("raises QueueExhaustedError at the growth limit with contents intact", () => {
    const queue = new GrowableSeriesQueue({ initialCapacity: 2, growthLimit: 4 });
    queue.push(1);
    queue.push(2);
    queue.push(3);
    queue.push(4);

    expect(() => queue.push(5))
      .to.throw(QueueExhaustedError, "Queue cannot grow to 8 slots")
      .with.property("requested", 8);
    expect(queue.toArray()).to.deep.equal([1, 2, 3, 4]);
  });

  it("caps growth at the limit when doubling would pass it", () => {
    const queue = new GrowableSeriesQueue({ initialCapacity: 4, growthLimit: 6 });
    for (let i = 0; i < 6; i++) {
      queue.push(i);
    }

    expect(queue.capacity).to.equal(6);
    expect(() => queue.push(6)).to.throw(QueueExhaustedError);
  });

  it("clear releases storage that grew", () => {
    const queue = new GrowableSeriesQueue({ initialCapacity: 2 });
    queue.push(1);
    queue.push(2);
    queue.push(3);
    expect(queue.capacity).to.equal(4);

    queue.clear();

    expect(queue.capacity).to.equal(2);
    expect(queue.isEmpty()).to.be.true;
    expect(queue.peek()).to.be.undefined;
  });
});

describe("createSeriesQueue", () => {
  it("builds a ring for the bounded strategy", () => {
    const queue = createSeriesQueue({ strategy: "bounded", capacity: 3 });
    expect(queue).to.be.instanceOf(RingSeriesQueue);
    expect(queue.strategy).to.equal("bounded");
  });

  it("builds a growable queue for the unbounded strategy", () => {
    const queue = createSeriesQueue({ strategy: "unbounded", capacity: 1, growthLimit: 32 });
    expect(queue).to.be.instanceOf(GrowableSeriesQueue);
    queue.push(1);
    queue.push(2);
    expect(queue.push(3).accepted).to.be.true;
  });
});
