import type { OutputObject, OutputRecord, OutputValue } from './types'

function isMapping(value: OutputValue | undefined): value is OutputObject {
  return typeof value === 'object' && !Array.isArray(value)
}

/**
 * Builds one nested output record from (path, value) writes.
 *
 * Intermediate objects are created on first use. At the final key a mapping is
 * merged into whatever mapping is already there, so several declared fields can
 * fill the same section; any other value replaces the previous one.
 */
export class RecordBuilder {
  private readonly root: OutputRecord = {}

  /**
   * @throws Error if an intermediate path element already holds a non-mapping.
   */
  write(path: readonly string[], value: OutputValue): void {
    const container = this.containerFor(path.slice(0, -1))

    if (path.length === 0) {
      if (!isMapping(value)) {
        throw new Error('Only a mapping can be written at the record root')
      }
      Object.assign(container, value)
      return
    }

    const key = path[path.length - 1]
    const existing = container[key]

    if (isMapping(value)) {
      container[key] = isMapping(existing) ? Object.assign(existing, value) : { ...value }
    } else {
      container[key] = value
    }
  }

  build(): OutputRecord {
    return this.root
  }

  private containerFor(path: readonly string[]): OutputObject {
    let node: OutputObject = this.root
    for (const key of path) {
      const next = node[key]
      if (next === undefined) {
        const created: OutputObject = {}
        node[key] = created
        node = created
      } else if (isMapping(next)) {
        node = next
      } else {
        throw new Error(`Cannot write below "${key}": it already holds a value`)
      }
    }
    return node
  }
}
