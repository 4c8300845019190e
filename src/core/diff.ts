import type { InteractiveElement, PageStateSnapshot } from '../schema/index.js';
import { elementKey } from '../schema/index.js';

export interface SnapshotDiff {
  elementsAppeared: InteractiveElement[];
  elementsDisappeared: InteractiveElement[];
  urlChanged: boolean;
}

function uniqueByKey(elements: readonly InteractiveElement[]): Map<string, InteractiveElement> {
  const map = new Map<string, InteractiveElement>();
  for (const el of elements) {
    if (!map.has(elementKey(el))) map.set(elementKey(el), el);
  }
  return map;
}

/** Element-set difference between two snapshots, in `after`/`before` order. */
export function diffSnapshots(
  before: PageStateSnapshot,
  after: PageStateSnapshot,
): SnapshotDiff {
  const beforeSet = uniqueByKey(before.interactiveElements);
  const afterSet = uniqueByKey(after.interactiveElements);

  const elementsAppeared = [...afterSet.entries()]
    .filter(([key]) => !beforeSet.has(key))
    .map(([, el]) => el);
  const elementsDisappeared = [...beforeSet.entries()]
    .filter(([key]) => !afterSet.has(key))
    .map(([, el]) => el);

  return {
    elementsAppeared,
    elementsDisappeared,
    urlChanged: before.url !== after.url,
  };
}
