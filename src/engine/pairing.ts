import type { BlockState } from "./components/BlockState.js";
import type { PairListener } from "../types/index.js";

/**
 * Emit every pair the block can currently form.
 *
 * Values are matched strictly by arrival order: the i-th first-series value
 * pairs with the i-th second-series value. Nothing is emitted while either
 * queue is empty. Returns the number of pairs emitted.
 */
export function flushPairs(block: BlockState, emit: PairListener): number {
  let emitted = 0;
  for (let taken = block.takePair(); taken !== undefined; taken = block.takePair()) {
    const [first, second] = taken;
    emit({ index: block.nextIndex(), labels: block.labels(), first, second });
    emitted++;
  }
  return emitted;
}
