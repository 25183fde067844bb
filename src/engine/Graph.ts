// src/engine/Graph.ts
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { GraphMeta } from '../types'
import { type GraphError, emptyGraph, invalidBoundaryVertex } from './errors'
import { type Indexed, type Pt, centroid, dist2, giftWrap, midpoint } from './geom'
import { QuadTree } from './QuadTree'
import { SelectionAdapter, normalizeColorClass } from './selection'

export type { Pt } from './geom'

export const SEED_SPAN = 100
export const OUTWARD_OFFSET = 100
export const COLOR_CLASSES = 4

const EPS = 1e-9

/** Unordered edge, stored with u < v. */
export type Edge = { readonly u: number; readonly v: number }

export interface GraphOptions {
  /** Source of randomness for insertRandom, in [0, 1). */
  random?: () => number
  seedSpan?: number
  outwardOffset?: number
  colorClasses?: number
}

export class Vertex {
  private idx: number
  private pos: Pt
  private colorIndex: number
  private diameter: number
  private neighbors = new Set<number>()
  constructor(idx: number, pos: Pt, colorIndex: number) {
    this.idx = idx; this.pos = { ...pos }; this.colorIndex = colorIndex
    this.diameter = Vertex.calcDiameter(idx)
  }
  static calcDiameter(idx: number): number {
    if (idx >= 1000) return 40
    if (idx >= 100) return 36
    if (idx >= 10) return 32
    return 30
  }
  getIndex() { return this.idx }
  getPosition(): Readonly<Pt> { return this.pos }
  /** Prefer Graph.moveVertex, which keeps the hit-test index current. */
  setPosition(p: Pt) { this.pos = { x: p.x, y: p.y } }
  getDiameter() { return this.diameter }
  getColorIndex() { return this.colorIndex }
  getNeighbors(): ReadonlySet<number> { return this.neighbors }
  getDegree() { return this.neighbors.size }
  link(other: number) { this.neighbors.add(other) }
}

export class Graph {
  periphery = {
    getIndices: () => this._periphery.slice(),
    contains: (u: number) => this._periphery.includes(u),
    neighborsOnPeriphery: (u: number): [number|null, number|null] => {
      const i = this._periphery.indexOf(u)
      if (i < 0 || this._periphery.length === 0) return [null, null]
      const n = this._periphery.length
      return [this._periphery[(i - 1 + n) % n] ?? null, this._periphery[(i + 1) % n] ?? null]
    }
  }
  readonly selection: SelectionAdapter

  // arena[i - 1] holds the vertex with index i
  private arena: Vertex[] = []
  private edgeKeys = new Set<string>()
  private edgeList: Edge[] = []
  private _periphery: number[] = []
  private maxVertex = Infinity
  private layoutVersion = 0
  private hitIndex: { version: number, tree: QuadTree<Indexed> } | null = null

  private readonly random: () => number
  private readonly seedSpan: number
  private readonly outwardOffset: number
  private readonly colorClasses: number

  constructor(opts: GraphOptions = {}) {
    this.random = opts.random ?? Math.random
    this.seedSpan = opts.seedSpan ?? SEED_SPAN
    this.outwardOffset = opts.outwardOffset ?? OUTWARD_OFFSET
    this.colorClasses = Math.max(1, Math.floor(opts.colorClasses ?? COLOR_CLASSES))
    this.selection = new SelectionAdapter(this)
  }

  // --- mutations ---

  /** Replaces all state with the seed triangle 1, 2, 3. */
  reset() {
    const s = this.seedSpan
    this.arena = []
    this.edgeKeys = new Set()
    this.edgeList = []
    const v1 = this.addVertex({ x: -s, y: -s / 2 }, 0)
    const v2 = this.addVertex({ x: s, y: -s / 2 }, 1)
    const v3 = this.addVertex({ x: 0, y: s }, 2)
    this.addEdge(v1.getIndex(), v2.getIndex())
    this.addEdge(v2.getIndex(), v3.getIndex())
    this.addEdge(v3.getIndex(), v1.getIndex())
    this._periphery = [v1.getIndex(), v2.getIndex(), v3.getIndex()]
    this.maxVertex = Infinity
    this.selection.cancel()
  }

  /**
   * Fan insertion: a new vertex joined to every periphery vertex on the arc
   * from vp to vq (stored order, wrapping past the end of the listing).
   * The arc's interior leaves the periphery; vp and vq stay on it.
   */
  insertOnArc(vp: number, vq: number, colorClass = 0): E.Either<GraphError, Vertex> {
    const per = this._periphery
    if (!per.length) return E.left(emptyGraph())
    const ip = per.indexOf(vp), iq = per.indexOf(vq)
    const missing = [...new Set([vp, vq])].filter(i => !per.includes(i))
    if (missing.length) return E.left(invalidBoundaryVertex(missing, 'not-on-periphery'))
    if (vp === vq) return E.left(invalidBoundaryVertex([vp, vq], 'degenerate-arc'))

    const arc = this.arcBetween(ip, iq)
    const v = this.addVertex(this.placeOutside(arc), normalizeColorClass(colorClass))
    for (const a of arc) this.addEdge(v.getIndex(), a)

    this._periphery = ip < iq
      ? [...per.slice(0, ip + 1), v.getIndex(), ...per.slice(iq)]
      : [...per.slice(iq, ip + 1), v.getIndex()]
    return E.right(v)
  }

  /** Inserts on a random arc with at least one interior vertex. */
  insertRandom(): O.Option<Vertex> {
    const per = this._periphery
    const n = per.length
    if (n < 3) return O.none
    const i = this.pick(n - 2)
    const j = i + 2 + this.pick(n - 2 - i)
    const color = this.pick(this.colorClasses)
    return O.fromEither(this.insertOnArc(per[i], per[j], color))
  }

  /** Non-finite bounds show everything. */
  setTruncation(m: number) { this.maxVertex = Number.isFinite(m) ? Math.max(0, Math.floor(m)) : Infinity }
  clearTruncation() { this.maxVertex = Infinity }
  getTruncation() { return this.maxVertex }

  /** Layout-only move; topology is untouched. */
  moveVertex(index: number, p: Pt): boolean {
    const v = this.arena[index - 1]
    if (!v) return false
    v.setPosition(p)
    this.layoutVersion++
    return true
  }

  // --- reads ---

  /** Geometric hull of every vertex, walked with no vertex to its left. Diagnostic only. */
  recomputeBoundary(): Vertex[] {
    const hull = giftWrap(this.arena.map(v => ({ ...v.getPosition(), index: v.getIndex() })))
    return hull.map(p => this.arena[p.index - 1])
  }

  isVisible(index: number) { return index <= this.maxVertex }

  getVertices(): Vertex[] { return this.arena.filter(v => this.isVisible(v.getIndex())) }
  getEdges(): Edge[] { return this.edgeList.filter(e => this.isVisible(e.v)) }
  getPeriphery(): Vertex[] { return this.visibleVertices(this._periphery) }

  /** The visible vertices among `indices`, in the given order; unknown indices are skipped. */
  visibleVertices(indices: readonly number[]): Vertex[] {
    return indices.flatMap(i => {
      const v = this.arena[i - 1]
      return v && this.isVisible(i) ? [v] : []
    })
  }

  getVertex(index: number): O.Option<Vertex> { return O.fromNullable(this.arena[index - 1]) }
  hasEdge(a: number, b: number) { return this.edgeKeys.has(edgeKey(a, b)) }

  getStats(): GraphMeta {
    return { total_vertices: this.arena.length, edges: this.edgeList.length, periphery_size: this._periphery.length }
  }

  get_bounding_box(): [number, number, number, number] {
    const xs: number[] = [], ys: number[] = []
    for (const v of this.getVertices()) { const p = v.getPosition(); xs.push(p.x); ys.push(p.y) }
    if (!xs.length) return [0,0,0,0]
    return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)]
  }

  /** Nearest visible vertex within `radius` of `p`; ties go to the later vertex. */
  vertexAt(p: Pt, radius: number, opts: { peripheryOnly?: boolean } = {}): O.Option<number> {
    const tree = this.spatialIndex()
    const r2 = radius * radius
    let best: Indexed | null = null
    for (const c of tree.retrieve(p, radius)) {
      if (!this.isVisible(c.index)) continue
      if (opts.peripheryOnly && !this._periphery.includes(c.index)) continue
      const d = dist2(c, p)
      if (d > r2) continue
      if (!best || d < dist2(best, p) || (d === dist2(best, p) && c.index > best.index)) best = c
    }
    return best ? O.some(best.index) : O.none
  }

  // --- private ---

  private addVertex(p: Pt, colorIndex: number): Vertex {
    const v = new Vertex(this.arena.length + 1, p, colorIndex)
    this.arena.push(v)
    this.layoutVersion++
    return v
  }

  private addEdge(a: number, b: number) {
    if (a === b) return
    const key = edgeKey(a, b)
    if (this.edgeKeys.has(key)) return
    this.edgeKeys.add(key)
    this.edgeList.push({ u: Math.min(a, b), v: Math.max(a, b) })
    this.arena[a - 1].link(b)
    this.arena[b - 1].link(a)
  }

  private arcBetween(ip: number, iq: number): number[] {
    const per = this._periphery, n = per.length
    const arc: number[] = []
    for (let k = ip; ; k = (k + 1) % n) {
      arc.push(per[k])
      if (k === iq) break
    }
    return arc
  }

  /**
   * Beyond the arc along the chord's outward normal. The periphery runs with
   * its interior on the left, so the outward side of vp→vq is the right.
   */
  private placeOutside(arc: number[]): Pt {
    const pts = arc.map(i => this.arena[i - 1].getPosition())
    const first = pts[0], last = pts[pts.length - 1]
    const h = midpoint(first, last)
    const cx = last.x - first.x, cy = last.y - first.y

    let nx = cy, ny = -cx
    if (Math.hypot(nx, ny) < EPS) {
      const c = centroid(pts)
      nx = c.x - h.x; ny = c.y - h.y
    }
    if (Math.hypot(nx, ny) < EPS) { nx = 0; ny = 1 }
    const L = Math.hypot(nx, ny)
    nx /= L; ny /= L

    let reach = 0
    for (const p of pts) reach = Math.max(reach, (p.x - h.x) * nx + (p.y - h.y) * ny)
    const d = reach + this.outwardOffset
    return { x: h.x + nx * d, y: h.y + ny * d }
  }

  private pick(k: number): number {
    return Math.min(k - 1, Math.floor(this.random() * k))
  }

  private spatialIndex(): QuadTree<Indexed> {
    if (!this.hitIndex || this.hitIndex.version !== this.layoutVersion) {
      const pts = this.arena.map(v => ({ ...v.getPosition(), index: v.getIndex() }))
      this.hitIndex = { version: this.layoutVersion, tree: QuadTree.fromPoints(pts) }
    }
    return this.hitIndex.tree
  }
}

function edgeKey(a: number, b: number) {
  return a < b ? `${a}-${b}` : `${b}-${a}`
}
