export type Pt = { x: number, y: number }

export function v_lerp(a: Pt, b: Pt, t: number): Pt {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t }
}

/** Twice the signed area of (a, b, c); positive when c lies left of a→b. */
export function orient(a: Pt, b: Pt, c: Pt): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x)
}

export function isLeft(a: Pt, b: Pt, c: Pt): boolean {
  return orient(a, b, c) > 0
}

export function dist2(a: Pt, b: Pt): number {
  const dx = a.x - b.x, dy = a.y - b.y
  return dx * dx + dy * dy
}

export function dist(a: Pt, b: Pt): number {
  return Math.sqrt(dist2(a, b))
}

export function midpoint(a: Pt, b: Pt): Pt {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 }
}

export function centroid(pts: readonly Pt[]): Pt {
  if (!pts.length) return { x: 0, y: 0 }
  let sx = 0, sy = 0
  for (const p of pts) { sx += p.x; sy += p.y }
  return { x: sx / pts.length, y: sy / pts.length }
}

export type Indexed = Pt & { index: number }

/**
 * Gift-wrapping boundary walk over a point set.
 *
 * Starts at the minimum-x point (then minimum y, then lowest index) and keeps
 * taking the candidate with no point strictly to its left. Among collinear
 * candidates the farthest wins, so points lying on a hull edge are skipped.
 * The walk gives up after `points.length` steps and returns what it has.
 */
export function giftWrap<T extends Indexed>(points: readonly T[]): T[] {
  if (!points.length) return []

  let start = points[0]
  for (const p of points) {
    if (p.x < start.x || (p.x === start.x && (p.y < start.y || (p.y === start.y && p.index < start.index)))) start = p
  }

  const hull: T[] = [start]
  let current = start
  for (let step = 0; step < points.length; step++) {
    let next: T | null = null
    for (const p of points) {
      if (p === current) continue
      if (next === null) { next = p; continue }
      const o = orient(current, next, p)
      if (o > 0 || (o === 0 && dist2(current, p) > dist2(current, next))) next = p
    }
    if (next === null || next === start) break
    hull.push(next)
    current = next
  }
  return hull
}
