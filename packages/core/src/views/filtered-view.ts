export type Predicate<T> = (element: T) => boolean
export type Transform<T, R> = (element: T) => R

const acceptAll = () => true

/**
 * Forward cursor over a FilteredView.
 *
 * `advance()` skips source elements the predicate rejects, so the predicate runs
 * at advance time. `current` applies the transform on each read.
 */
export class FilteredCursor<T, R> implements Iterator<R> {
  private readonly source: Iterator<T>
  private slot: { element: T } | undefined
  private position = -1
  private finished = false

  constructor(
    private readonly origin: Iterable<T>,
    private readonly predicate: Predicate<T>,
    private readonly transform: Transform<T, R>,
  ) {
    this.source = origin[Symbol.iterator]()
  }

  /** Cursor that is already past the last element */
  static end<T, R>(): FilteredCursor<T, R> {
    const cursor = new FilteredCursor<T, R>([], acceptAll, () => {
      throw new Error('end cursor has no element')
    })
    cursor.finished = true
    return cursor
  }

  get done(): boolean {
    return this.finished
  }

  /** Index of the current element in the source sequence; -1 at the end */
  get sourcePosition(): number {
    return this.finished ? -1 : this.position
  }

  /**
   * Transformed current element.
   * @throws Error when the cursor is at the end
   */
  get current(): R {
    if (this.finished || !this.slot) {
      throw new Error('cursor is not positioned on an element')
    }
    return this.transform(this.slot.element)
  }

  /** Move to the next source element that passes the predicate */
  advance(): this {
    if (this.finished) return this
    for (;;) {
      const step = this.source.next()
      this.position++
      if (step.done) {
        this.finished = true
        this.slot = undefined
        return this
      }
      if (this.predicate(step.value)) {
        this.slot = { element: step.value }
        return this
      }
    }
  }

  /**
   * Same position in the same source iterable; all end cursors are equal.
   * Sources compare by identity, so cursors of two views built over equal but
   * distinct sources are never equal unless both are at the end.
   */
  equals(other: FilteredCursor<T, R>): boolean {
    if (this.finished || other.finished) return this.finished === other.finished
    return this.origin === other.origin && this.position === other.position
  }

  next(): IteratorResult<R> {
    this.advance()
    if (this.finished) return { done: true, value: undefined }
    return { done: false, value: this.current }
  }
}

/**
 * Lazy view of `transform(e)` for each source element `e` where `predicate(e)` holds.
 *
 * Nothing is buffered: each pass re-reads the source from its first element, so
 * a view can be iterated any number of times. State held by the predicate or
 * transform (a shared decode buffer, for instance) is the only thing carried
 * between elements.
 */
export class FilteredView<T, R> implements Iterable<R> {
  constructor(
    private readonly source: Iterable<T>,
    private readonly predicate: Predicate<T>,
    private readonly transform: Transform<T, R>,
  ) {}

  /** Unfiltered transform of every source element */
  static map<T, R>(source: Iterable<T>, transform: Transform<T, R>): FilteredView<T, R> {
    return new FilteredView(source, acceptAll, transform)
  }

  begin(): FilteredCursor<T, R> {
    return new FilteredCursor(this.source, this.predicate, this.transform).advance()
  }

  end(): FilteredCursor<T, R> {
    return FilteredCursor.end()
  }

  [Symbol.iterator](): Iterator<R> {
    return new FilteredCursor(this.source, this.predicate, this.transform)
  }

  first(): R | undefined {
    const cursor = this.begin()
    return cursor.done ? undefined : cursor.current
  }

  isEmpty(): boolean {
    return this.begin().done
  }

  count(): number {
    let n = 0
    for (let c = this.begin(); !c.done; c.advance()) n++
    return n
  }

  toArray(): R[] {
    return Array.from(this)
  }
}
