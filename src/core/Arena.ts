/**
 * Generational arena - the slot storage behind every scene graph
 * 世代竞技场 - 每个场景图背后的槽位存储
 *
 * Values live in numbered slots. A handle packs the slot index together with the slot's
 * generation, so a handle to a freed (and possibly reused) slot is detected as stale.
 * 值存放在编号槽位中。句柄将槽位索引与世代号打包，因此指向已释放（可能已复用）槽位的句柄会被识别为过期。
 */

import { makeHandle, indexOf, genOf, MAX_GENERATION, MAX_SLOTS } from '../utils/Types';
import type { Handle } from '../utils/Types';

/**
 * Arena with O(1) insert, remove and lookup
 * 支持O(1)插入、删除和查找的竞技场
 */
export class Arena<T> {
  private generations: Uint32Array;
  private alive: Uint8Array;
  private values: Array<T | undefined> = [];
  private free: number[] = [];
  // Slot 0 is reserved so that no handle is ever 0 (the root sentinel)
  // 槽位0保留，保证句柄永不为0（根哨兵）
  private nextIndex = 1;
  private _size = 0;

  private readonly maxSlots: number;

  /**
   * Create new arena with initial capacity
   * 创建具有初始容量的新竞技场
   *
   * @param maxSlots highest slot index handed out; capped at MAX_SLOTS
   */
  constructor(initialCapacity = 64, maxSlots = MAX_SLOTS) {
    this.maxSlots = Math.min(maxSlots, MAX_SLOTS);
    const cap = Math.max(2, initialCapacity | 0);
    this.generations = new Uint32Array(cap);
    this.alive = new Uint8Array(cap);
  }

  /**
   * Ensure arrays have capacity for the given index
   * 确保数组对给定索引有容量
   */
  private ensure(index: number): void {
    if (index < this.generations.length) return;

    let newSize = this.generations.length || 1;
    while (newSize <= index) {
      newSize <<= 1;
    }

    const newGenerations = new Uint32Array(newSize);
    newGenerations.set(this.generations);
    this.generations = newGenerations;

    const newAlive = new Uint8Array(newSize);
    newAlive.set(this.alive);
    this.alive = newAlive;
  }

  /**
   * Number of live values
   * 存活值的数量
   */
  get size(): number {
    return this._size;
  }

  /**
   * Number of slots allocated so far, live or free
   * 已分配的槽位数量（含空闲）
   */
  get capacity(): number {
    return this.generations.length;
  }

  /**
   * Insert a value and return its handle
   * 插入值并返回其句柄
   */
  insert(value: T): Handle {
    let index = this.free.pop();
    if (index === undefined) {
      if (this.nextIndex > this.maxSlots) {
        throw new RangeError(`[Arena] slot limit of ${this.maxSlots} exceeded`);
      }
      index = this.nextIndex++;
    }
    this.ensure(index);

    this.alive[index] = 1;
    this.values[index] = value;
    this._size++;

    return makeHandle(index, this.generations[index]);
  }

  /**
   * Remove the value behind a handle. Stale or absent handles yield undefined.
   * 移除句柄对应的值。过期或不存在的句柄返回undefined。
   */
  remove(handle: Handle): T | undefined {
    if (!this.contains(handle)) return undefined;

    const index = indexOf(handle);
    const value = this.values[index];
    this.release(index);
    this._size--;

    return value;
  }

  /**
   * Check if handle is live
   * 检查句柄是否存活
   */
  contains(handle: Handle): boolean {
    const index = indexOf(handle);
    return index > 0 &&
           index < this.generations.length &&
           this.alive[index] === 1 &&
           this.generations[index] === genOf(handle);
  }

  get(handle: Handle): T | undefined {
    return this.contains(handle) ? this.values[indexOf(handle)] : undefined;
  }

  /**
   * Fetch two distinct slots at once. Passing the same handle twice is a caller bug.
   * 同时获取两个不同槽位。传入相同句柄属于调用方错误。
   */
  getPair(a: Handle, b: Handle): [T | undefined, T | undefined] {
    if (a === b) {
      throw new Error(`[Arena] getPair called with the same handle twice (${a})`);
    }
    return [this.get(a), this.get(b)];
  }

  /**
   * Iterate over all live [handle, value] pairs in slot order
   * 按槽位顺序遍历所有存活的 [句柄, 值]
   */
  *entries(): IterableIterator<[Handle, T]> {
    for (let i = 1; i < this.nextIndex; i++) {
      if (this.alive[i] !== 1) continue;
      const value = this.values[i];
      if (value !== undefined) {
        yield [makeHandle(i, this.generations[i]), value];
      }
    }
  }

  /**
   * Free every slot, keeping the allocated capacity. Outstanding handles become stale.
   * 释放所有槽位但保留容量。已发出的句柄全部失效。
   */
  clear(): void {
    this.free.length = 0;
    for (let i = this.nextIndex - 1; i >= 1; i--) {
      if (this.alive[i] === 1) {
        this.release(i);
      } else {
        this.free.push(i);
      }
    }
    this._size = 0;
  }

  private release(index: number): void {
    this.alive[index] = 0;
    this.values[index] = undefined;
    this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;
    this.free.push(index);
  }
}
