import { formatIpv4 } from './ipv4.js';
import type { AddressInterval, TargetAddress } from '../types/targets.js';

/**
 * Deduplicated, read-only set of IPv4 addresses held as sorted, disjoint,
 * non-adjacent inclusive intervals. A /8 costs one interval, not sixteen
 * million numbers.
 */
export class AddressSet implements Iterable<TargetAddress> {
  private readonly intervals: readonly AddressInterval[];
  readonly size: number;

  private constructor(intervals: AddressInterval[]) {
    this.intervals = intervals;
    this.size = intervals.reduce((total, { first, last }) => total + (last - first + 1), 0);
  }

  static empty(): AddressSet {
    return new AddressSet([]);
  }

  static of(...addresses: TargetAddress[]): AddressSet {
    return AddressSet.fromIntervals(addresses.map((address) => ({ first: address, last: address })));
  }

  static fromIntervals(intervals: Iterable<AddressInterval>): AddressSet {
    const sorted = [...intervals]
      .filter(({ first, last }) => first <= last)
      .sort((a, b) => a.first - b.first);

    const merged: AddressInterval[] = [];
    for (const { first, last } of sorted) {
      const previous = merged[merged.length - 1];
      if (previous && first <= previous.last + 1) {
        previous.last = Math.max(previous.last, last);
      } else {
        merged.push({ first, last });
      }
    }
    return new AddressSet(merged);
  }

  static union(...sets: AddressSet[]): AddressSet {
    return AddressSet.fromIntervals(sets.flatMap((set) => set.toIntervals()));
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  has(address: TargetAddress): boolean {
    let lo = 0;
    let hi = this.intervals.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const interval = this.intervals[mid];
      if (!interval) break;
      if (address < interval.first) {
        hi = mid - 1;
      } else if (address > interval.last) {
        lo = mid + 1;
      } else {
        return true;
      }
    }
    return false;
  }

  toIntervals(): AddressInterval[] {
    return this.intervals.map(({ first, last }) => ({ first, last }));
  }

  *[Symbol.iterator](): Iterator<TargetAddress> {
    for (const { first, last } of this.intervals) {
      for (let address = first; address <= last; address++) {
        yield address;
      }
    }
  }

  toStrings(): string[] {
    return Array.from(this, formatIpv4);
  }
}
