import type { Block } from './types.js';

/**
 * Choose the block a cursor refers to.
 *
 * The first block whose `[start, end]` range holds the cursor wins. Failing
 * that, the block whose start is nearest; on equal distance the earlier block
 * is kept, since only a strictly smaller distance replaces the current pick.
 */
export function pickBlock(blocks: readonly Block[], cursor: number): Block | undefined {
  const containing = blocks.find((block) => cursor >= block.start && cursor <= block.end);
  if (containing) return containing;

  let nearest: Block | undefined;
  let nearestDistance = Infinity;
  for (const block of blocks) {
    const distance = Math.abs(block.start - cursor);
    if (distance < nearestDistance) {
      nearest = block;
      nearestDistance = distance;
    }
  }
  return nearest;
}
