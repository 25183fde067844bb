import { describe, it, expect, beforeEach } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import { Graph, Vertex } from './Graph'
import type { GraphError } from './errors'
import { orient, type Pt } from './geom'

function seeded(seed: number): () => number {
  let s = seed >>> 0
  return () => {
    s = (s * 1664525 + 1013904223) >>> 0
    return s / 2 ** 32
  }
}

function expectRight(res: E.Either<GraphError, Vertex>): Vertex {
  if (E.isLeft(res)) throw new Error(`expected insertion to succeed, got ${res.left.type}`)
  return res.right
}

function expectLeft(res: E.Either<GraphError, Vertex>): GraphError {
  if (E.isRight(res)) throw new Error(`expected insertion to fail, got vertex ${res.right.getIndex()}`)
  return res.left
}

function counts(g: Graph) {
  const s = g.getStats()
  return [s.total_vertices, s.edges, s.periphery_size]
}

function neighborsOf(g: Graph, i: number): number[] {
  const v = O.toNullable(g.getVertex(i))
  return v ? [...v.getNeighbors()].sort((a, b) => a - b) : []
}

/** Same cycle, possibly starting elsewhere in the listing. */
function rotateToStart(cycle: number[], first: number): number[] {
  const k = cycle.indexOf(first)
  return [...cycle.slice(k), ...cycle.slice(0, k)]
}

function outsideConvex(poly: Pt[], p: Pt): boolean {
  return poly.some((a, k) => orient(a, poly[(k + 1) % poly.length], p) < 0)
}

describe('Graph', () => {
  let g: Graph

  beforeEach(() => {
    g = new Graph({ random: seeded(7) })
    g.reset()
  })

  describe('reset', () => {
    it('installs the seed triangle', () => {
      expect(counts(g)).toEqual([3, 3, 3])
      expect(g.periphery.getIndices()).toEqual([1, 2, 3])
      expect(g.getEdges()).toEqual([{ u: 1, v: 2 }, { u: 2, v: 3 }, { u: 1, v: 3 }])
      for (const v of g.getVertices()) expect(v.getDegree()).toBe(2)
      expect(g.getVertices().map(v => v.getColorIndex())).toEqual([0, 1, 2])
      expect(g.getTruncation()).toBe(Infinity)
    })

    it('lists the seed periphery with positive orientation', () => {
      const [a, b, c] = g.getPeriphery().map(v => v.getPosition())
      expect(orient(a, b, c)).toBeGreaterThan(0)
    })

    it('replaces a grown graph wholesale', () => {
      expectRight(g.insertOnArc(1, 2))
      g.setTruncation(2)
      g.selection.begin()
      g.reset()
      expect(counts(g)).toEqual([3, 3, 3])
      expect(g.getTruncation()).toBe(Infinity)
      expect(g.selection.getState()).toEqual({ kind: 'Idle' })
      expect(O.isNone(g.getVertex(4))).toBe(true)
    })
  })

  describe('insertOnArc', () => {
    it('joins an adjacent pair and keeps both endpoints on the periphery', () => {
      const v = expectRight(g.insertOnArc(1, 2))
      expect(v.getIndex()).toBe(4)
      expect(g.hasEdge(1, 4)).toBe(true)
      expect(g.hasEdge(2, 4)).toBe(true)
      expect(g.hasEdge(3, 4)).toBe(false)
      expect(g.periphery.getIndices()).toEqual([1, 4, 2, 3])
      expect(counts(g)).toEqual([4, 5, 4])
    })

    it('replaces the interior of a longer arc', () => {
      expectRight(g.insertOnArc(1, 2))
      const v = expectRight(g.insertOnArc(4, 3))
      expect(v.getIndex()).toBe(5)
      expect(neighborsOf(g, 5)).toEqual([2, 3, 4])
      expect(g.periphery.getIndices()).toEqual([1, 4, 5, 3])
      expect(counts(g)).toEqual([5, 8, 4])
    })

    it('wraps past the end of the listing when vp follows vq', () => {
      expectRight(g.insertOnArc(1, 2))
      // periphery [1, 4, 2, 3]; arc 3 → 1 → 4
      const v = expectRight(g.insertOnArc(3, 4))
      expect(neighborsOf(g, v.getIndex())).toEqual([1, 3, 4])
      expect(rotateToStart(g.periphery.getIndices(), 3)).toEqual([3, 5, 4, 2])
    })

    it('walks forward and wrapped arcs along the same cycle', () => {
      const a = new Graph(); a.reset()
      const b = new Graph(); b.reset()
      expectRight(a.insertOnArc(1, 2))
      expectRight(b.insertOnArc(1, 2))
      // both periphery listings are [1, 4, 2, 3]; one arc runs forward, the other wraps
      expectRight(a.insertOnArc(4, 3))
      expectRight(b.insertOnArc(2, 1))
      expect(neighborsOf(a, 5)).toEqual([2, 3, 4])
      expect(neighborsOf(b, 5)).toEqual([1, 2, 3])
      expect(rotateToStart(a.periphery.getIndices(), 4)).toEqual([4, 5, 3, 1])
      expect(rotateToStart(b.periphery.getIndices(), 2)).toEqual([2, 5, 1, 4])
    })

    it('accepts an arc covering the whole periphery', () => {
      // vq sits just before vp, so the arc is 2 → 3 → 1
      const v = expectRight(g.insertOnArc(2, 1))
      expect(v.getDegree()).toBe(3)
      expect(rotateToStart(g.periphery.getIndices(), 2)).toEqual([2, 4, 1])
    })

    it('changes the counts by (+1, +k, 3 - k) for an arc of k vertices', () => {
      expectRight(g.insertOnArc(1, 2))
      expectRight(g.insertOnArc(4, 2))
      const before = counts(g)
      // periphery [1, 4, 5, 2, 3]; arc 5 → 2 → 3 → 1 has k = 4
      const v = expectRight(g.insertOnArc(5, 1))
      expect(v.getDegree()).toBe(4)
      expect(counts(g)).toEqual([before[0] + 1, before[1] + 4, before[2] + 3 - 4])
    })

    it('places the new vertex outside the periphery', () => {
      const v4 = expectRight(g.insertOnArc(1, 2))
      expect(v4.getPosition().x).toBeCloseTo(0)
      expect(v4.getPosition().y).toBeCloseTo(-150)

      const before = g.getPeriphery().map(v => v.getPosition())
      const v5 = expectRight(g.insertOnArc(4, 3))
      expect(v5.getPosition().x).toBeCloseTo(200)
      expect(v5.getPosition().y).toBeCloseTo(-25)
      expect(outsideConvex(before, v5.getPosition())).toBe(true)
    })

    it('normalises the color class', () => {
      expect(expectRight(g.insertOnArc(1, 2, 3)).getColorIndex()).toBe(3)
      expect(expectRight(g.insertOnArc(2, 3, -2)).getColorIndex()).toBe(0)
      expect(expectRight(g.insertOnArc(3, 1, 2.8)).getColorIndex()).toBe(2)
    })

    it('maps a non-finite color class to 0', () => {
      expect(expectRight(g.insertOnArc(1, 2, NaN)).getColorIndex()).toBe(0)
      expect(expectRight(g.insertOnArc(2, 3, Infinity)).getColorIndex()).toBe(0)
    })

    it('rejects vp === vq and leaves the graph alone', () => {
      const err = expectLeft(g.insertOnArc(2, 2))
      expect(err).toEqual({ type: 'InvalidBoundaryVertex', vertices: [2, 2], reason: 'degenerate-arc' })
      expect(counts(g)).toEqual([3, 3, 3])
      expect(g.periphery.getIndices()).toEqual([1, 2, 3])
    })

    it('rejects vertices that are not on the periphery', () => {
      expectRight(g.insertOnArc(1, 3))
      // periphery [1, 4, 3]; vertex 2 is now interior
      const before = counts(g)
      expect(expectLeft(g.insertOnArc(2, 1))).toEqual({
        type: 'InvalidBoundaryVertex', vertices: [2], reason: 'not-on-periphery'
      })
      expect(expectLeft(g.insertOnArc(99, 98))).toEqual({
        type: 'InvalidBoundaryVertex', vertices: [99, 98], reason: 'not-on-periphery'
      })
      expect(counts(g)).toEqual(before)
    })

    it('reports an empty graph before any reset', () => {
      expect(expectLeft(new Graph().insertOnArc(1, 2))).toEqual({ type: 'EmptyGraph' })
    })
  })

  describe('insertRandom', () => {
    it('returns none on an empty graph', () => {
      expect(O.isNone(new Graph().insertRandom())).toBe(true)
    })

    it('uses the whole seed triangle as the arc', () => {
      const h = new Graph({ random: () => 0.5 })
      h.reset()
      const v = O.toNullable(h.insertRandom())
      expect(v?.getIndex()).toBe(4)
      expect(v?.getColorIndex()).toBe(2)
      expect(neighborsOf(h, 4)).toEqual([1, 2, 3])
      expect(h.periphery.getIndices()).toEqual([1, 4, 3])
      expect(counts(h)).toEqual([4, 6, 3])
    })

    it('stays in range when the random source returns values close to 1', () => {
      const h = new Graph({ random: () => 0.9999999 })
      h.reset()
      for (let i = 0; i < 5; i++) expect(O.isSome(h.insertRandom())).toBe(true)
      expect(h.getVertices().every(v => v.getColorIndex() < 4)).toBe(true)
    })

    it('keeps the periphery and counting invariants over many insertions', () => {
      for (let step = 0; step < 60; step++) {
        const before = counts(g)
        const v = O.toNullable(g.insertRandom())
        if (!v) throw new Error('random insertion failed')
        const k = v.getDegree()
        expect(k).toBeGreaterThanOrEqual(3)
        expect(counts(g)).toEqual([before[0] + 1, before[1] + k, before[2] + 3 - k])

        const per = g.periphery.getIndices()
        expect(per.length).toBeGreaterThanOrEqual(3)
        expect(new Set(per).size).toBe(per.length)
        expect(per).toContain(v.getIndex())
        per.forEach((u, i) => expect(g.hasEdge(u, per[(i + 1) % per.length])).toBe(true))

        // a triangulated disc has 3n - 3 - b edges
        const [n, e, b] = counts(g)
        expect(e).toBe(3 * n - 3 - b)
      }
    })
  })

  describe('truncation', () => {
    beforeEach(() => {
      expectRight(g.insertOnArc(1, 2))
      expectRight(g.insertOnArc(4, 3))
    })

    it('hides later vertices, their edges and periphery entries', () => {
      g.setTruncation(4)
      expect(g.getVertices().map(v => v.getIndex())).toEqual([1, 2, 3, 4])
      expect(g.getEdges().every(e => e.u <= 4 && e.v <= 4)).toBe(true)
      expect(g.getEdges()).toHaveLength(5)
      expect(g.getPeriphery().map(v => v.getIndex())).toEqual([1, 4, 3])
    })

    it('never removes anything', () => {
      g.setTruncation(1)
      expect(g.getVertices()).toHaveLength(1)
      expect(g.getEdges()).toEqual([])
      expect(counts(g)).toEqual([5, 8, 4])
      expect(O.toNullable(g.getVertex(5))?.getIndex()).toBe(5)
      expect(g.periphery.getIndices()).toEqual([1, 4, 5, 3])
    })

    it('restores the same view once cleared', () => {
      const vs = g.getVertices(), es = g.getEdges(), ps = g.getPeriphery()
      g.setTruncation(3)
      g.clearTruncation()
      expect(g.getVertices()).toEqual(vs)
      expect(g.getEdges()).toEqual(es)
      expect(g.getPeriphery()).toEqual(ps)
    })

    it('floors the bound and clamps it at zero', () => {
      g.setTruncation(2.7)
      expect(g.getTruncation()).toBe(2)
      g.setTruncation(-4)
      expect(g.getTruncation()).toBe(0)
      expect(g.getVertices()).toEqual([])
    })

    it('shows everything for a non-finite bound', () => {
      g.setTruncation(2)
      g.setTruncation(NaN)
      expect(g.getTruncation()).toBe(Infinity)
      expect(g.getVertices()).toHaveLength(5)
      g.setTruncation(Infinity)
      expect(g.getTruncation()).toBe(Infinity)
    })

    it('filters an index list down to visible vertices in order', () => {
      g.setTruncation(4)
      expect(g.isVisible(4)).toBe(true)
      expect(g.isVisible(5)).toBe(false)
      expect(g.visibleVertices([1, 5, 3, 2, 9]).map(v => v.getIndex())).toEqual([1, 3, 2])
    })
  })

  describe('recomputeBoundary', () => {
    it('walks the seed hull opposite to the maintained periphery', () => {
      expect(g.recomputeBoundary().map(v => v.getIndex())).toEqual([1, 3, 2])
    })

    it('finds all four corners of a square without touching the periphery', () => {
      expectRight(g.insertOnArc(1, 2))
      g.moveVertex(1, { x: 0, y: 0 })
      g.moveVertex(2, { x: 10, y: 0 })
      g.moveVertex(3, { x: 10, y: 10 })
      g.moveVertex(4, { x: 0, y: 10 })
      expect(g.recomputeBoundary().map(v => v.getIndex())).toEqual([1, 4, 3, 2])
      expect(g.periphery.getIndices()).toEqual([1, 4, 2, 3])
    })

    it('ignores truncation', () => {
      expectRight(g.insertOnArc(1, 2))
      g.setTruncation(3)
      expect(g.recomputeBoundary()).toHaveLength(4)
    })

    it('returns nothing for an empty graph', () => {
      expect(new Graph().recomputeBoundary()).toEqual([])
    })
  })

  describe('vertexAt', () => {
    it('finds the vertex under a point', () => {
      expect(g.vertexAt({ x: -95, y: -50 }, 20)).toEqual(O.some(1))
      expect(g.vertexAt({ x: 0, y: 0 }, 20)).toEqual(O.none)
    })

    it('skips truncated vertices', () => {
      expectRight(g.insertOnArc(1, 2))
      g.setTruncation(3)
      expect(g.vertexAt({ x: 0, y: -150 }, 20)).toEqual(O.none)
      g.clearTruncation()
      expect(g.vertexAt({ x: 0, y: -150 }, 20)).toEqual(O.some(4))
    })

    it('can be limited to periphery vertices', () => {
      expectRight(g.insertOnArc(1, 3))
      expect(g.vertexAt({ x: 100, y: -50 }, 20)).toEqual(O.some(2))
      expect(g.vertexAt({ x: 100, y: -50 }, 20, { peripheryOnly: true })).toEqual(O.none)
    })

    it('sees vertices after they move', () => {
      expect(g.vertexAt({ x: 500, y: 500 }, 5)).toEqual(O.none)
      expect(g.moveVertex(1, { x: 500, y: 500 })).toBe(true)
      expect(g.vertexAt({ x: 500, y: 500 }, 5)).toEqual(O.some(1))
      expect(g.moveVertex(99, { x: 0, y: 0 })).toBe(false)
    })
  })

  it('reports periphery neighbours cyclically', () => {
    expect(g.periphery.neighborsOnPeriphery(1)).toEqual([3, 2])
    expect(g.periphery.neighborsOnPeriphery(7)).toEqual([null, null])
  })

  it('sizes vertices by index width', () => {
    expect(Vertex.calcDiameter(9)).toBe(30)
    expect(Vertex.calcDiameter(10)).toBe(32)
    expect(Vertex.calcDiameter(100)).toBe(36)
    expect(Vertex.calcDiameter(1000)).toBe(40)
  })
})
