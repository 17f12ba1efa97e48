/**
 * 乱数源のインターフェース
 * 木の生成・シェイク・スパークルの初速度はすべてここから引く
 */
export interface RandomSource {
  /** [0, 1) の一様乱数 */
  next(): number;
}

/**
 * Math.randomを使う乱数源
 */
export class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * シード付き乱数源（xorshift32）
 * 同じシードなら同じ木・同じフレーム列を再現できる
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // 0はxorshiftの不動点なので避ける
    this.state = (seed | 0) || 0x9e3779b9;
  }

  next(): number {
    let s = this.state;
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    this.state = s;
    return (s >>> 0) / 0x100000000;
  }
}

/**
 * [min, max) の一様乱数
 */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * [min, max] の整数乱数（両端を含む）
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

/**
 * 確率pでtrue
 */
export function chance(random: RandomSource, p: number): boolean {
  return random.next() < p;
}

/**
 * 配列から1つ選ぶ
 */
export function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.floor(random.next() * items.length);
  return items[Math.min(index, items.length - 1)];
}
