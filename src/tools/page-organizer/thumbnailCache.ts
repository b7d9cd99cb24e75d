import type { Size, Thumbnail } from '@/types/index.ts'
import type { CacheLimits, CacheStats } from './types.ts'
import { THUMBNAIL_CACHE_LIMITS } from './types.ts'

interface CachedThumbnail {
  image: Thumbnail
  cost: number
  lastAccess: number
}

/**
 * Render key for a page at a target size. Built from the page's identity in
 * its source, so reordering never invalidates a thumbnail.
 */
export function thumbnailKey(sourceId: string, pageIndex: number, size: Size): string {
  return `${sourceId}:${pageIndex}@${size.width}x${size.height}`
}

/**
 * Bounded thumbnail store with a count limit and a total byte-cost limit.
 * Least recently accessed entries go first.
 *
 * Every call runs to completion on the event loop, so concurrent render tasks
 * cannot interleave inside get/put.
 */
export class ThumbnailCache {
  private readonly entries = new Map<string, CachedThumbnail>()
  private readonly limits: CacheLimits
  private totalCost = 0
  private clock = 0
  private hits = 0
  private misses = 0

  constructor(limits: Partial<CacheLimits> = {}) {
    this.limits = { ...THUMBNAIL_CACHE_LIMITS, ...limits }
  }

  get(key: string): Thumbnail | undefined {
    const cached = this.entries.get(key)
    if (!cached) {
      this.misses++
      return undefined
    }
    this.hits++
    cached.lastAccess = ++this.clock
    return cached.image
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  /**
   * Insert or replace. An entry larger than the whole budget is still
   * accepted; everything else is evicted to make room for it.
   */
  put(key: string, image: Thumbnail, cost: number = image.data.byteLength): void {
    const previous = this.entries.get(key)
    if (previous) {
      this.totalCost -= previous.cost
    }
    this.entries.set(key, { image, cost, lastAccess: ++this.clock })
    this.totalCost += cost
    this.evict(key)
  }

  delete(key: string): boolean {
    const cached = this.entries.get(key)
    if (!cached) return false
    this.totalCost -= cached.cost
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
    this.totalCost = 0
  }

  get size(): number {
    return this.entries.size
  }

  get cost(): number {
    return this.totalCost
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      cost: this.totalCost,
      hits: this.hits,
      misses: this.misses,
    }
  }

  private overBudget(): boolean {
    return this.entries.size > this.limits.maxEntries || this.totalCost > this.limits.maxCost
  }

  private evict(keep: string) {
    while (this.overBudget()) {
      let oldestKey: string | null = null
      let oldestTime = Infinity
      for (const [key, val] of this.entries) {
        if (key !== keep && val.lastAccess < oldestTime) {
          oldestTime = val.lastAccess
          oldestKey = key
        }
      }
      if (oldestKey === null) return
      this.delete(oldestKey)
    }
  }
}
