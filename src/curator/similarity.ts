interface Block {
  a: number;
  b: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) list.push(j);
    else positions.set(b[j], [j]);
  }
  return positions;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]. Among equally long
 * blocks the one starting earliest in `a` wins, then earliest in `b`.
 */
function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { a: alo, b: blo, size: 0 };
  // runLength.get(j) = length of the match ending at a[i - 1], b[j]
  let runLength = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLength.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    runLength = next;
  }

  return best;
}

export function matchingBlocks(a: string, b: string): Block[] {
  const positions = indexPositions(b);
  const blocks: Block[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let range = queue.pop(); range !== undefined; range = queue.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const block = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (block.size === 0) continue;

    blocks.push(block);
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Ratio of characters covered by the recursive longest-matching-blocks
 * decomposition: 2·M / (|a| + |b|). 0 when either side is empty.
 */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const matched = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / (a.length + b.length);
}
