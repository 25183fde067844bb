import React, { useCallback, useEffect, useImperativeHandle, useRef, useState } from 'react'
import * as O from 'fp-ts/lib/Option.js'
import * as E from 'fp-ts/lib/Either.js'
import { Graph, Vertex } from '../engine/Graph'
import { describeGraphError } from '../engine/errors'
import { centroid, v_lerp, type Pt } from '../engine/geom'
import type { GraphInfo, LabelMode } from '../types'

export type CanvasGraphHandle = {
  startGraph: () => void
  addRandom: () => void
  addOnArc: (vp: number, vq: number) => void
  beginSelect: () => void
  cancelSelect: () => void
  checkBoundary: () => void
  getInfo: () => GraphInfo
  center: () => void
  zoomIn: () => void
  zoomOut: () => void
  toggleLabels: () => void
  setColorClass: (c: number) => void
  goTo: (m: number) => void
  showAll: () => void
}

type Props = {
  onChange?: (info: GraphInfo) => void
  onGoToRequest?: () => void
}

const SPAWN_ANIM_MS = 420
const PALETTE_OUTLINE = ['#e74c3c', '#3498db', '#2ecc71', '#f1c40f']
const PALETTE_FILL = ['#ff6b6b', '#48dbfb', '#1dd1a1', '#feca57']

export const CanvasGraph = React.forwardRef<CanvasGraphHandle, Props>(({ onChange, onGoToRequest }, ref) => {
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const [graph] = useState(() => new Graph())

  // camera
  const cam = useRef({ x: 0, y: 0, scale: 1 })
  const isDown = useRef(false)
  const dragging = useRef(false)
  const downAt = useRef({ x: 0, y: 0 })
  const last = useRef({ x: 0, y: 0 })

  const labelMode = useRef<LabelMode>('index')
  // last recovered hull, cleared by the next mutation
  const hullRef = useRef<number[] | null>(null)
  // display-only spawn animation of the newest vertex
  const animRef = useRef<{ index: number, from: Pt, t0: number, dur: number } | null>(null)

  const onChangeRef = useRef(onChange)
  onChangeRef.current = onChange
  const onGoToRef = useRef(onGoToRequest)
  onGoToRef.current = onGoToRequest

  // HUD
  const [hud, setHud] = useState<string>('')
  const hudTimer = useRef<number | null>(null)
  function showHud(text: string, ms = 2600) {
    setHud(text)
    if (hudTimer.current) window.clearTimeout(hudTimer.current)
    hudTimer.current = window.setTimeout(() => setHud(''), ms)
  }

  const info = useCallback((): GraphInfo => {
    const s = graph.getStats()
    return {
      V: s.total_vertices,
      E: s.edges,
      periphery: s.periphery_size,
      selection: graph.selection.describe(),
      truncation: graph.getTruncation(),
    }
  }, [graph])

  const emit = useCallback(() => { onChangeRef.current?.(info()) }, [info])

  const worldToScreen = useCallback((x: number, y: number) => {
    const { scale, x: ox, y: oy } = cam.current
    const validScale = Math.max(1e-9, scale)
    return { x: (x - ox) * validScale, y: (y - oy) * validScale }
  }, [cam])

  const screenToWorld = useCallback((x: number, y: number) => {
    const { scale, x: ox, y: oy } = cam.current
    const validScale = Math.max(1e-9, scale)
    return { x: x / validScale + ox, y: y / validScale + oy }
  }, [cam])

  function nodePx(v: Vertex): number {
    const scale = cam.current.scale || 1
    return Math.max(6, Math.min(44, v.getDiameter() * Math.min(scale, 1)))
  }

  function displayPos(v: Vertex): Pt {
    const a = animRef.current
    const p = v.getPosition()
    if (!a || a.index !== v.getIndex()) return p
    const t = Math.min(1, (performance.now() - a.t0) / a.dur)
    return v_lerp(a.from, p, t)
  }

  const draw = useCallback(() => {
    const canvas = canvasRef.current
    if (!canvas) return
    const ctx = canvas.getContext('2d'); if (!ctx) return

    try {
      const dpr = window.devicePixelRatio || 1
      const w = canvas.clientWidth || 300, h = canvas.clientHeight || 150
      if (canvas.width !== w * dpr || canvas.height !== h * dpr) {
        canvas.width = w * dpr; canvas.height = h * dpr
        ctx.setTransform(dpr, 0, 0, dpr, 0, 0)
      }
      ctx.clearRect(0, 0, w, h)
      ctx.lineCap = 'round'; ctx.lineJoin = 'round'
    } catch (error) {
      console.error('Canvas setup failed:', error)
      return
    }

    const cs = getComputedStyle(canvas)

    // Periphery
    try {
      const pts = graph.getPeriphery().map(v => { const p = displayPos(v); return worldToScreen(p.x, p.y) })
      if (pts.length > 2) {
        ctx.beginPath()
        ctx.moveTo(pts[0].x, pts[0].y)
        for (const p of pts.slice(1)) ctx.lineTo(p.x, p.y)
        ctx.closePath()
        ctx.fillStyle = cs.getPropertyValue('--periphery-fill').trim() || 'rgba(200,200,255,0.4)'
        ctx.fill()
        ctx.strokeStyle = cs.getPropertyValue('--periphery-stroke').trim() || '#6464c8'
        ctx.lineWidth = 2
        ctx.stroke()
      }
    } catch (error) {
      console.error('Periphery rendering failed:', error)
    }

    // Edges
    try {
      ctx.strokeStyle = cs.getPropertyValue('--edge-color').trim() || '#3c3c3c'
      ctx.lineWidth = Math.max(0.5, 2.0 / (1.0 + 0.0002 * graph.getStats().total_vertices))
      ctx.beginPath()
      for (const e of graph.getEdges()) {
        const a = O.toNullable(graph.getVertex(e.u)), b = O.toNullable(graph.getVertex(e.v))
        if (!a || !b) continue
        const p1 = displayPos(a), p2 = displayPos(b)
        const s1 = worldToScreen(p1.x, p1.y), s2 = worldToScreen(p2.x, p2.y)
        ctx.moveTo(s1.x, s1.y); ctx.lineTo(s2.x, s2.y)
      }
      ctx.stroke()
    } catch (error) {
      console.error('Edge rendering failed:', error)
    }

    // Recovered hull overlay, limited to the visible prefix
    const hull = graph.visibleVertices(hullRef.current ?? [])
    if (hull.length > 1) {
      try {
        ctx.save()
        ctx.setLineDash([6, 4])
        ctx.strokeStyle = cs.getPropertyValue('--hull-color').trim() || '#e67e22'
        ctx.lineWidth = 2
        ctx.beginPath()
        hull.forEach((v, k) => {
          const p = v.getPosition(), s = worldToScreen(p.x, p.y)
          if (k === 0) ctx.moveTo(s.x, s.y); else ctx.lineTo(s.x, s.y)
        })
        ctx.closePath()
        ctx.stroke()
        ctx.restore()
      } catch (error) {
        console.error('Hull overlay failed:', error)
      }
    }

    // Vertices
    const selected = new Set(graph.selection.getSelected())
    for (const v of graph.getVertices()) {
      try {
        const p = displayPos(v)
        const s = worldToScreen(p.x, p.y)
        const d = nodePx(v)
        const c = ((v.getColorIndex() % PALETTE_FILL.length) + PALETTE_FILL.length) % PALETTE_FILL.length
        ctx.fillStyle = PALETTE_FILL[c]; ctx.strokeStyle = PALETTE_OUTLINE[c]; ctx.lineWidth = 2
        ctx.beginPath(); ctx.arc(s.x, s.y, d / 2, 0, Math.PI * 2); ctx.fill(); ctx.stroke()
        if (selected.has(v.getIndex())) {
          ctx.strokeStyle = '#ffd400'; ctx.lineWidth = 3
          ctx.beginPath(); ctx.arc(s.x, s.y, d / 2 + 5, 0, Math.PI * 2); ctx.stroke()
        }
        ctx.fillStyle = '#000000'
        ctx.font = `${Math.max(1, Math.round(0.6 * d))}px Arial`
        ctx.textAlign = 'center'; ctx.textBaseline = 'middle'
        const label = labelMode.current === 'index' ? v.getIndex() : v.getColorIndex()
        ctx.fillText(String(label), s.x, s.y)
      } catch (error) {
        console.error(`Vertex ${v.getIndex()} rendering failed:`, error)
      }
    }
  }, [graph, worldToScreen])

  const center = useCallback(() => {
    const [minx, miny, maxx, maxy] = graph.get_bounding_box()
    const canvas = canvasRef.current
    if (!canvas) return

    const w = canvas.clientWidth || canvas.width
    const h = canvas.clientHeight || canvas.height
    const pw = Math.max(maxx - minx, 1), ph = Math.max(maxy - miny, 1)
    if (w < 2 || h < 2) return

    const padPx = Math.max(40, Math.min(80, Math.min(w, h) * 0.06))
    const scale = Math.max(1e-4, Math.min((w - 2 * padPx) / pw, (h - 2 * padPx) / ph))
    cam.current = {
      x: (minx + maxx) / 2 - w / (2 * scale),
      y: (miny + maxy) / 2 - h / (2 * scale),
      scale,
    }
    draw()
  }, [graph, draw])

  const zoomBy = useCallback((f: number) => {
    const canvas = canvasRef.current
    if (!canvas) return
    const MIN_SCALE = 1e-4, MAX_SCALE = 1e6
    const rect = canvas.getBoundingClientRect()
    const cx = rect.width / 2, cy = rect.height / 2
    const before = screenToWorld(cx, cy)
    cam.current.scale = Math.min(MAX_SCALE, Math.max(MIN_SCALE, cam.current.scale * f))
    const after = screenToWorld(cx, cy)
    cam.current.x += (before.x - after.x)
    cam.current.y += (before.y - after.y)
    draw()
  }, [screenToWorld, draw])

  function step(now: number) {
    const a = animRef.current
    if (!a) return
    draw()
    if (now - a.t0 < a.dur) requestAnimationFrame(step)
    else { animRef.current = null; center() }
  }

  function afterInsert(v: Vertex) {
    hullRef.current = null
    const from = centroid([...v.getNeighbors()].flatMap(i => {
      const n = O.toNullable(graph.getVertex(i))
      return n ? [n.getPosition()] : []
    }))
    animRef.current = { index: v.getIndex(), from, t0: performance.now(), dur: SPAWN_ANIM_MS }
    requestAnimationFrame(step)
    emit()
  }

  function reset() {
    hullRef.current = null
    animRef.current = null
    graph.reset()
    emit()
    center()
  }

  function beginSelect() {
    graph.selection.begin()
    emit(); draw()
    showHud('Select Vp (periphery), then Vq')
  }

  function cancelSelect() {
    if (graph.selection.getState().kind === 'Idle') return
    graph.selection.cancel()
    emit(); draw()
    showHud('Selection cancelled')
  }

  function findVertexAt(offsetX: number, offsetY: number): O.Option<number> {
    const p = screenToWorld(offsetX, offsetY)
    const scale = Math.max(1e-9, cam.current.scale)
    const maxD = Vertex.calcDiameter(graph.getStats().total_vertices)
    const rWorld = (Math.max(6, Math.min(44, maxD * Math.min(scale, 1))) / 2) / scale * 1.2 // easier clicking
    const peripheryOnly = graph.selection.getState().kind === 'AwaitingFirst'
    return graph.vertexAt(p, rWorld, { peripheryOnly })
  }

  function handleTap(offsetX: number, offsetY: number) {
    const outcome = graph.selection.pick(findVertexAt(offsetX, offsetY))
    switch (outcome.kind) {
      case 'ignored':
        return
      case 'first':
        showHud(`Vp = ${outcome.vp}, now pick Vq`)
        break
      case 'inserted':
        afterInsert(outcome.vertex)
        showHud(`Added vertex ${outcome.vertex.getIndex()}`)
        break
      case 'failed':
        console.warn('Insertion rejected:', describeGraphError(outcome.error))
        showHud(describeGraphError(outcome.error))
        break
    }
    emit(); draw()
  }

  useEffect(() => {
    reset()
    return () => {
      if (hudTimer.current) window.clearTimeout(hudTimer.current)
    }
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [])

  useEffect(() => {
    const onResize = () => { if (!animRef.current && !isDown.current && !dragging.current) center() }
    window.addEventListener('resize', onResize)
    return () => window.removeEventListener('resize', onResize)
  }, [center])

  // Keyboard
  useEffect(() => {
    const canvas = canvasRef.current
    if (!canvas) return

    const handleKeyDown = (e: KeyboardEvent) => {
      if (['ArrowUp', 'ArrowDown', 'ArrowLeft', 'ArrowRight', '+', '-', '=', 'Escape'].includes(e.key)) {
        e.preventDefault()
      }

      const panStep = 50 / cam.current.scale

      switch (e.key) {
        case 'ArrowUp':
          cam.current.y -= panStep; draw(); break
        case 'ArrowDown':
          cam.current.y += panStep; draw(); break
        case 'ArrowLeft':
          cam.current.x -= panStep; draw(); break
        case 'ArrowRight':
          cam.current.x += panStep; draw(); break
        case '+':
        case '=':
          zoomBy(1.2); break
        case '-':
          zoomBy(1/1.2); break
        case 'c':
        case 'C':
          center(); break
        case 's':
        case 'S':
          reset(); showHud('New graph started'); break
        case 'r':
        case 'R':
          addRandom(); break
        case 'a':
        case 'A':
          beginSelect(); break
        case 't':
        case 'T':
          toggleLabels(); break
        case 'b':
        case 'B':
          checkBoundary(); break
        case 'g':
        case 'G':
          onGoToRef.current?.(); break
        case 'Escape':
          cancelSelect(); break
      }
    }

    canvas.addEventListener('keydown', handleKeyDown)
    return () => canvas.removeEventListener('keydown', handleKeyDown)
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [draw, zoomBy, center])

  function addRandom() {
    const added = graph.insertRandom()
    if (O.isNone(added)) { showHud('No valid periphery arc'); return }
    afterInsert(added.value)
    showHud(`Added vertex ${added.value.getIndex()}`)
  }

  function toggleLabels() {
    labelMode.current = labelMode.current === 'index' ? 'color' : 'index'
    draw()
    showHud(`Labels: ${labelMode.current}`)
  }

  function checkBoundary() {
    const hull = graph.recomputeBoundary().map(v => v.getIndex())
    hullRef.current = hull
    draw()
    showHud(`Hull: ${hull.join(', ')}`, 4000)
  }

  useImperativeHandle(ref, () => ({
    startGraph() {
      reset()
      showHud('New graph started')
    },

    addRandom,

    addOnArc(vp: number, vq: number) {
      const res = graph.insertOnArc(vp, vq, graph.selection.getColorClass())
      if (E.isLeft(res)) {
        console.warn('Insertion rejected:', describeGraphError(res.left))
        showHud(describeGraphError(res.left))
        return
      }
      afterInsert(res.right)
      showHud(`Added vertex ${res.right.getIndex()}`)
    },

    beginSelect,
    cancelSelect,
    checkBoundary,
    getInfo: info,

    center: () => { center() },
    zoomIn:  () => zoomBy(1.15),
    zoomOut: () => zoomBy(1 / 1.15),

    toggleLabels,

    setColorClass(c: number) {
      graph.selection.setColorClass(c)
      showHud(`Color class: ${graph.selection.getColorClass()}`)
    },

    goTo(m: number) {
      graph.setTruncation(m)
      emit(); center()
      showHud(`Showing 1..${graph.getTruncation()}`)
    },

    showAll() {
      graph.clearTruncation()
      emit(); center()
      showHud('Showing all vertices')
    },
  }))

  // Pointer
  useEffect(() => {
    const canvas = canvasRef.current
    if (!canvas) return
    const onContextMenu = (e: MouseEvent) => { e.preventDefault(); cancelSelect() }
    const onWheel = (e: WheelEvent) => {
      e.preventDefault()
      const { offsetX, offsetY, deltaY } = e
      const s = Math.exp(-deltaY / 300)
      const { x: wx, y: wy } = screenToWorld(offsetX, offsetY)
      cam.current.scale *= s
      const { x: wx2, y: wy2 } = screenToWorld(offsetX, offsetY)
      cam.current.x += wx - wx2; cam.current.y += wy - wy2
      draw()
    }
    const onDown = (e: MouseEvent) => {
      if (e.button !== 0) return
      isDown.current = true; dragging.current = false
      downAt.current = { x: e.clientX, y: e.clientY }; last.current = { x: e.clientX, y: e.clientY }
    }
    const onMove = (e: MouseEvent) => {
      if (!isDown.current) return
      const moved = Math.hypot(e.clientX - downAt.current.x, e.clientY - downAt.current.y)
      if (!dragging.current && moved > 3) dragging.current = true
      if (dragging.current) {
        const dx = (e.clientX - last.current.x) / cam.current.scale, dy = (e.clientY - last.current.y) / cam.current.scale
        cam.current.x -= dx; cam.current.y -= dy; last.current = { x: e.clientX, y: e.clientY }; draw()
      }
    }
    const onUp = (e: MouseEvent) => {
      if (!isDown.current) return
      const wasDragging = dragging.current
      isDown.current = false
      dragging.current = false
      if (wasDragging) return
      const rect = canvas.getBoundingClientRect()
      handleTap(e.clientX - rect.left, e.clientY - rect.top)
    }

    const onTouchStart = (e: TouchEvent) => {
      if (e.touches.length !== 1) return
      e.preventDefault()
      isDown.current = true
      dragging.current = false
      downAt.current = { x: e.touches[0].clientX, y: e.touches[0].clientY }
      last.current = { x: e.touches[0].clientX, y: e.touches[0].clientY }
    }
    const onTouchMove = (e: TouchEvent) => {
      if (!isDown.current || e.touches.length !== 1) return
      e.preventDefault()
      const t = e.touches[0]
      const moved = Math.hypot(t.clientX - downAt.current.x, t.clientY - downAt.current.y)
      if (!dragging.current && moved > 3) dragging.current = true
      if (dragging.current) {
        cam.current.x -= (t.clientX - last.current.x) / cam.current.scale
        cam.current.y -= (t.clientY - last.current.y) / cam.current.scale
        last.current = { x: t.clientX, y: t.clientY }
        draw()
      }
    }
    const onTouchEnd = (e: TouchEvent) => {
      const wasDragging = dragging.current
      isDown.current = false
      dragging.current = false
      if (wasDragging || e.changedTouches.length !== 1) return
      const touch = e.changedTouches[0]
      const rect = canvas.getBoundingClientRect()
      handleTap(touch.clientX - rect.left, touch.clientY - rect.top)
    }

    canvas.addEventListener('contextmenu', onContextMenu)
    canvas.addEventListener('wheel', onWheel, { passive: false })
    canvas.addEventListener('mousedown', onDown)
    window.addEventListener('mousemove', onMove)
    window.addEventListener('mouseup', onUp)
    canvas.addEventListener('touchstart', onTouchStart, { passive: false })
    canvas.addEventListener('touchmove', onTouchMove, { passive: false })
    canvas.addEventListener('touchend', onTouchEnd)

    return () => {
      canvas.removeEventListener('contextmenu', onContextMenu)
      canvas.removeEventListener('wheel', onWheel)
      canvas.removeEventListener('mousedown', onDown)
      window.removeEventListener('mousemove', onMove)
      window.removeEventListener('mouseup', onUp)
      canvas.removeEventListener('touchstart', onTouchStart)
      canvas.removeEventListener('touchmove', onTouchMove)
      canvas.removeEventListener('touchend', onTouchEnd)
    }
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [])

  const getAccessibleDescription = () => {
    const s = graph.getStats()
    const sel = graph.selection.getState().kind !== 'Idle' ? ' Currently in selection mode.' : ''
    return `Graph with ${s.total_vertices} vertices and ${s.edges} edges. ${s.periphery_size} vertices on periphery.${sel}`
  }

  return (
    <div className="canvas-wrap">
      <canvas
        ref={canvasRef}
        className="graph-canvas"
        aria-label="Graph canvas. S new, R random, A select, Esc cancel, arrows pan, + and - zoom, C center."
        role="application"
        tabIndex={0}
      />
      <div className="hud" data-show={hud ? '1' : '0'} role="status">{hud}</div>
      <div className="sr-only" aria-live="polite">
        {getAccessibleDescription()}
      </div>
    </div>
  )
})

CanvasGraph.displayName = 'CanvasGraph'
