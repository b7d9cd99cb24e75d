import type { RenderBackend, Size, Thumbnail } from '@/types/index.ts'
import { RenderError } from './errors.ts'
import { thumbnailKey } from './thumbnailCache.ts'
import type { ThumbnailCache } from './thumbnailCache.ts'
import type { RenderRequest } from './types.ts'
import { THUMBNAIL_BATCH_SIZE, THUMBNAIL_SIZE } from './types.ts'

export interface ThumbnailPipelineOptions {
  backend: RenderBackend
  cache: ThumbnailCache
  /** Write a finished thumbnail back to the entry with this id, if it still exists */
  publish: (id: string, thumbnail: Thumbnail) => void
  batchSize?: number
  targetSize?: Size
  onError?: (error: RenderError) => void
}

interface RenderTask {
  request: RenderRequest
  controller: AbortController
}

const ABANDONED = Symbol('abandoned')

/**
 * Settles with the work's result, or with ABANDONED as soon as the signal
 * aborts. Abandoned work keeps running; its result is ignored.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABANDONED> {
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABANDONED)
    signal.addEventListener('abort', onAbort, { once: true })
    work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort))
  })
}

/**
 * Fills in page thumbnails in the background.
 *
 * Requests are processed in fixed-size batches: renders inside a batch run
 * together and the next batch starts once every one of them has finished or
 * been cancelled. Later `schedule` calls queue behind earlier ones, so no more
 * than `batchSize` renders are ever outstanding.
 *
 * Each entry id has at most one pending task. Cancellation is checked before
 * the render and again before publishing; a cancelled task never publishes
 * and never writes the cache.
 */
export class ThumbnailPipeline {
  private readonly backend: RenderBackend
  private readonly cache: ThumbnailCache
  private readonly publish: (id: string, thumbnail: Thumbnail) => void
  private readonly onError?: (error: RenderError) => void
  readonly batchSize: number
  readonly targetSize: Size

  private readonly pending = new Map<string, AbortController>()
  // Shared renders for the same key (duplicate pages in flight at once)
  private readonly inFlight = new Map<string, Promise<Thumbnail>>()
  private queue: Promise<void> = Promise.resolve()

  constructor(options: ThumbnailPipelineOptions) {
    this.backend = options.backend
    this.cache = options.cache
    this.publish = options.publish
    this.onError = options.onError
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? THUMBNAIL_BATCH_SIZE))
    this.targetSize = options.targetSize ?? THUMBNAIL_SIZE
  }

  /**
   * Queue thumbnails for these entries. An id that already has a pending
   * task has that task cancelled and replaced. Resolves once this call's
   * batches have all settled; never rejects.
   */
  schedule(requests: readonly RenderRequest[]): Promise<void> {
    if (requests.length === 0) return this.queue

    const tasks = requests.map((request): RenderTask => {
      this.pending.get(request.id)?.abort()
      const controller = new AbortController()
      this.pending.set(request.id, controller)
      return { request, controller }
    })

    const run = this.queue.then(() => this.runBatches(tasks))
    this.queue = run
    return run
  }

  cancel(id: string): boolean {
    const controller = this.pending.get(id)
    if (!controller) return false
    controller.abort()
    this.pending.delete(id)
    return true
  }

  cancelAll(): void {
    for (const controller of this.pending.values()) {
      controller.abort()
    }
    this.pending.clear()
  }

  isPending(id: string): boolean {
    return this.pending.has(id)
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** Resolves when everything scheduled so far has settled */
  idle(): Promise<void> {
    return this.queue
  }

  keyFor(request: RenderRequest): string {
    return thumbnailKey(request.page.source.id, request.page.pageIndex, this.targetSize)
  }

  private async runBatches(tasks: RenderTask[]): Promise<void> {
    for (let i = 0; i < tasks.length; i += this.batchSize) {
      const batch = tasks.slice(i, i + this.batchSize)
      await Promise.all(batch.map((task) => this.renderOne(task)))
    }
  }

  private async renderOne({ request, controller }: RenderTask): Promise<void> {
    const { signal } = controller
    try {
      if (signal.aborted) return

      const key = this.keyFor(request)
      const cached = this.cache.get(key)
      if (cached) {
        this.publish(request.id, cached)
        return
      }

      const image = await untilAborted(this.renderShared(key, request), signal)
      if (image === ABANDONED || signal.aborted) return

      this.cache.put(key, image)
      this.publish(request.id, image)
    } catch (err) {
      const error = new RenderError(request.id, err)
      console.error(`[Page Organizer] ${error.message}`)
      this.onError?.(error)
    } finally {
      if (this.pending.get(request.id) === controller) {
        this.pending.delete(request.id)
      }
    }
  }

  private renderShared(key: string, request: RenderRequest): Promise<Thumbnail> {
    const existing = this.inFlight.get(key)
    if (existing) return existing

    const work = this.backend.render(request.page, this.targetSize)
    this.inFlight.set(key, work)
    const settle = () => {
      if (this.inFlight.get(key) === work) this.inFlight.delete(key)
    }
    work.then(settle, settle)
    return work
  }
}
