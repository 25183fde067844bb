export type Bounds = { x: number; y: number; width: number; height: number }
export type Point = { x: number; y: number }

export class QuadTree<T extends Point> {
  private bounds: Bounds
  private maxObjects: number
  private maxLevels: number
  private level: number
  private objects: T[] = []
  private nodes: QuadTree<T>[] = []

  constructor(bounds: Bounds, maxObjects = 10, maxLevels = 6, level = 0) {
    this.bounds = bounds
    this.maxObjects = maxObjects
    this.maxLevels = maxLevels
    this.level = level
  }

  static fromPoints<T extends Point>(points: readonly T[], pad = 1): QuadTree<T> {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity
    for (const p of points) {
      minX = Math.min(minX, p.x); minY = Math.min(minY, p.y)
      maxX = Math.max(maxX, p.x); maxY = Math.max(maxY, p.y)
    }
    if (!points.length) { minX = minY = 0; maxX = maxY = 0 }
    const tree = new QuadTree<T>({
      x: minX - pad,
      y: minY - pad,
      width: maxX - minX + 2 * pad,
      height: maxY - minY + 2 * pad
    })
    for (const p of points) tree.insert(p)
    return tree
  }

  split(): void {
    const subWidth = this.bounds.width / 2
    const subHeight = this.bounds.height / 2
    const x = this.bounds.x
    const y = this.bounds.y
    const next = this.level + 1

    this.nodes[0] = new QuadTree<T>({ x: x + subWidth, y, width: subWidth, height: subHeight }, this.maxObjects, this.maxLevels, next)
    this.nodes[1] = new QuadTree<T>({ x, y, width: subWidth, height: subHeight }, this.maxObjects, this.maxLevels, next)
    this.nodes[2] = new QuadTree<T>({ x, y: y + subHeight, width: subWidth, height: subHeight }, this.maxObjects, this.maxLevels, next)
    this.nodes[3] = new QuadTree<T>({ x: x + subWidth, y: y + subHeight, width: subWidth, height: subHeight }, this.maxObjects, this.maxLevels, next)
  }

  /** Quadrant holding `point`, or -1 when it sits on a midline. */
  getIndex(point: Point): number {
    const verticalMidpoint = this.bounds.x + this.bounds.width / 2
    const horizontalMidpoint = this.bounds.y + this.bounds.height / 2

    const top = point.y < horizontalMidpoint
    const bottom = point.y > horizontalMidpoint

    if (point.x < verticalMidpoint) {
      if (top) return 1
      if (bottom) return 2
    } else if (point.x > verticalMidpoint) {
      if (top) return 0
      if (bottom) return 3
    }
    return -1
  }

  insert(point: T): void {
    if (this.nodes.length > 0) {
      const index = this.getIndex(point)
      if (index !== -1) {
        this.nodes[index].insert(point)
        return
      }
    }

    this.objects.push(point)

    if (this.objects.length > this.maxObjects && this.level < this.maxLevels) {
      if (this.nodes.length === 0) {
        this.split()
      }

      let i = 0
      while (i < this.objects.length) {
        const index = this.getIndex(this.objects[i])
        if (index !== -1) {
          this.nodes[index].insert(this.objects.splice(i, 1)[0])
        } else {
          i++
        }
      }
    }
  }

  /** Every stored point inside the axis-aligned square of half-side `radius` around `point`. */
  retrieve(point: Point, radius: number): T[] {
    const found: T[] = []
    const searchArea = {
      x: point.x - radius,
      y: point.y - radius,
      width: radius * 2,
      height: radius * 2
    }

    this._retrieve(searchArea, found)
    return found
  }

  private _retrieve(searchArea: Bounds, found: T[]): void {
    if (!this._intersects(searchArea, this.bounds)) {
      return
    }

    for (const obj of this.objects) {
      if (this._intersects(searchArea, { x: obj.x, y: obj.y, width: 0, height: 0 })) {
        found.push(obj)
      }
    }

    for (const node of this.nodes) {
      node._retrieve(searchArea, found)
    }
  }

  private _intersects(rect1: Bounds, rect2: Bounds): boolean {
    return !(
      rect2.x > rect1.x + rect1.width ||
      rect2.x + rect2.width < rect1.x ||
      rect2.y > rect1.y + rect1.height ||
      rect2.y + rect2.height < rect1.y
    )
  }

  getBounds(): Bounds {
    return { ...this.bounds }
  }

  getObjectCount(): number {
    let count = this.objects.length
    for (const node of this.nodes) {
      count += node.getObjectCount()
    }
    return count
  }
}
