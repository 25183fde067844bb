import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { GraphError } from './errors'
import type { Vertex } from './Graph'

export type SelectionState =
  | { readonly kind: 'Idle' }
  | { readonly kind: 'AwaitingFirst' }
  | { readonly kind: 'AwaitingSecond'; readonly vp: number }

export type PickOutcome =
  | { readonly kind: 'ignored' }
  | { readonly kind: 'first'; readonly vp: number }
  | { readonly kind: 'inserted'; readonly vertex: Vertex }
  | { readonly kind: 'failed'; readonly error: GraphError }

/** What the adapter needs from the engine. */
export interface ArcInserter {
  readonly periphery: { contains(u: number): boolean }
  insertOnArc(vp: number, vq: number, colorClass?: number): E.Either<GraphError, Vertex>
}

const IDLE: SelectionState = { kind: 'Idle' }

/** Color classes are non-negative integers; anything non-finite becomes 0. */
export function normalizeColorClass(c: number): number {
  return Number.isFinite(c) ? Math.max(0, Math.floor(c)) : 0
}

/**
 * Two-pick flow for deliberate insertion: begin, pick Vp on the periphery,
 * pick Vq, insert. A finished attempt always lands back in Idle.
 */
export class SelectionAdapter {
  private state: SelectionState = IDLE
  private colorClass = 0

  constructor(private readonly graph: ArcInserter) {}

  getState(): SelectionState { return this.state }

  getSelected(): number[] {
    return this.state.kind === 'AwaitingSecond' ? [this.state.vp] : []
  }

  getColorClass() { return this.colorClass }
  setColorClass(c: number) { this.colorClass = normalizeColorClass(c) }

  begin() { this.state = { kind: 'AwaitingFirst' } }

  cancel() { this.state = IDLE }

  pick(hit: O.Option<number>): PickOutcome {
    if (O.isNone(hit)) return { kind: 'ignored' }
    const u = hit.value
    switch (this.state.kind) {
      case 'Idle':
        return { kind: 'ignored' }
      case 'AwaitingFirst':
        if (!this.graph.periphery.contains(u)) return { kind: 'ignored' }
        this.state = { kind: 'AwaitingSecond', vp: u }
        return { kind: 'first', vp: u }
      case 'AwaitingSecond': {
        const vp = this.state.vp
        if (u === vp) return { kind: 'ignored' }
        this.state = IDLE
        const res = this.graph.insertOnArc(vp, u, this.colorClass)
        return E.isRight(res)
          ? { kind: 'inserted', vertex: res.right }
          : { kind: 'failed', error: res.left }
      }
    }
  }

  describe(): string {
    switch (this.state.kind) {
      case 'Idle': return 'idle'
      case 'AwaitingFirst': return 'pick Vp'
      case 'AwaitingSecond': return `pick Vq (Vp = ${this.state.vp})`
    }
  }
}
