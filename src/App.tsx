import { useCallback, useEffect, useRef, useState } from 'react'
import { CanvasGraph, type CanvasGraphHandle } from './components/CanvasGraph'
import { COLOR_CLASSES } from './engine/Graph'
import type { GraphInfo } from './types'
import './styles.css'

const EMPTY_INFO: GraphInfo = { V: 0, E: 0, periphery: 0, selection: 'idle', truncation: Infinity }

export default function App() {
  const graphRef = useRef<CanvasGraphHandle>(null)
  const goToRef = useRef<HTMLInputElement>(null)

  // UI state
  const [dark, setDark] = useState(false)
  const [colorClass, setColorClass] = useState(0)
  const [goToM, setGoToM] = useState(1)
  const [stats, setStats] = useState<GraphInfo>(EMPTY_INFO)

  // Chip animation helpers
  const [chipTick, setChipTick] = useState({ V: 0, E: 0, P: 0 })
  const [chipDelta, setChipDelta] = useState({ V: 0, E: 0, P: 0 }) // -1 down, 0 same, +1 up

  useEffect(() => {
    document.documentElement.setAttribute('data-theme', dark ? 'dark' : 'light')
  }, [dark])

  const statsRef = useRef<GraphInfo>(EMPTY_INFO)
  const onGraphChange = useCallback((next: GraphInfo) => {
    const prev = statsRef.current
    statsRef.current = next
    if (next.V !== prev.V || next.E !== prev.E || next.periphery !== prev.periphery) {
      setChipTick(t => ({
        V: t.V + (next.V !== prev.V ? 1 : 0),
        E: t.E + (next.E !== prev.E ? 1 : 0),
        P: t.P + (next.periphery !== prev.periphery ? 1 : 0),
      }))
      setChipDelta({
        V: Math.sign(next.V - prev.V),
        E: Math.sign(next.E - prev.E),
        P: Math.sign(next.periphery - prev.periphery),
      })
    }
    setStats(next)
    setGoToM(m => Math.max(1, Math.min(m, next.V || 1)))
  }, [])

  const chipClass = (d: number) => `chip ${d > 0 ? 'up' : d < 0 ? 'down' : ''}`
  const truncated = Number.isFinite(stats.truncation)

  return (
    <div className="shell">
      {/* Canvas stage */}
      <main className="stage">
        <div className="stage-inner">
          <CanvasGraph ref={graphRef} onChange={onGraphChange} onGoToRequest={() => goToRef.current?.focus()} />
          {/* Floating toolbar */}
          <div className="fab-col" role="toolbar" aria-label="Graph controls">
            <button className="fab" title="Zoom in (+)" aria-label="Zoom in" onClick={() => graphRef.current?.zoomIn()}>+</button>
            <button className="fab" title="Zoom out (-)" aria-label="Zoom out" onClick={() => graphRef.current?.zoomOut()}>−</button>
            <button className="fab" title="Center Graph (C)" aria-label="Center graph" onClick={() => graphRef.current?.center()}>⌖</button>
          </div>
          <div className="sel-pill" aria-live="polite" data-testid="selection-pill">Selection: {stats.selection}</div>
        </div>
      </main>

      {/* Control Dock */}
      <aside className="dock">
        <div className="dock-head">
          <div className="dock-title">
            Controls
            <div className="dock-subtitle">Planar Triangulated Graph</div>
          </div>
          <div className="right">
            <div className="chips">
              <div className={chipClass(chipDelta.V)} key={`V-${chipTick.V}`} title="Vertices">V: {stats.V}</div>
              <div className={chipClass(chipDelta.E)} key={`E-${chipTick.E}`} title="Edges">E: {stats.E}</div>
              <div className={chipClass(chipDelta.P)} key={`P-${chipTick.P}`} title="Periphery">P: {stats.periphery}</div>
            </div>
            <label className="switch" role="switch" aria-checked={dark}>
              <input
                type="checkbox"
                checked={dark}
                onChange={e => setDark(e.target.checked)}
                aria-label="Toggle dark mode"
              />
              <span className="slider" />
              <span className="switch-label">Dark</span>
            </label>
          </div>
        </div>

        {/* EDIT */}
        <details open className="card">
          <summary>Edit</summary>
          <div id="edit-section">
            <button className="btn primary" onClick={() => graphRef.current?.startGraph()}>
              New Graph
            </button>

            <button className="btn" onClick={() => graphRef.current?.addRandom()}>
              Add Random Vertex
            </button>

            <div className="row">
              <button className="btn" onClick={() => graphRef.current?.beginSelect()}>
                Add Vertex by Selection
              </button>
              <button
                className="btn"
                disabled={stats.selection === 'idle'}
                onClick={() => graphRef.current?.cancelSelect()}
              >
                Cancel Selection
              </button>
            </div>

            <div className="label" id="color-class-label">Color class for new vertices</div>
            <div className="seg" role="radiogroup" aria-labelledby="color-class-label">
              {Array.from({ length: COLOR_CLASSES }, (_, c) => (
                <button
                  key={c}
                  className={`seg-btn ${colorClass === c ? 'active' : ''}`}
                  onClick={() => { setColorClass(c); graphRef.current?.setColorClass(c) }}
                  role="radio"
                  aria-checked={colorClass === c}
                >{c}</button>
              ))}
            </div>

            <button className="btn" onClick={() => graphRef.current?.checkBoundary()}>
              Check Boundary
            </button>
          </div>
        </details>

        {/* VIEW */}
        <details open className="card">
          <summary>View</summary>
          <div id="view-section">
            <div className="row">
              <button className="btn" onClick={() => graphRef.current?.zoomIn()}>Zoom in</button>
              <button className="btn" onClick={() => graphRef.current?.zoomOut()}>Zoom out</button>
            </div>

            <div className="row">
              <button className="btn" onClick={() => graphRef.current?.center()}>Center Graph</button>
              <button className="btn" onClick={() => graphRef.current?.toggleLabels()}>Toggle Labels</button>
            </div>

            <div className="label" id="goto-vertex-label">Go to Vertex m</div>
            <div className="row">
              <input
                ref={goToRef}
                className="input"
                type="number"
                min={1}
                max={Math.max(1, stats.V)}
                value={goToM}
                onChange={e => setGoToM(Math.max(1, Math.min(stats.V || 1, parseInt(e.target.value || '1', 10) || 1)))}
                onKeyDown={e => { if (e.key === 'Enter') graphRef.current?.goTo(goToM) }}
                aria-labelledby="goto-vertex-label"
              />
              <button className="btn" onClick={() => graphRef.current?.goTo(goToM)} aria-label={`Go to vertex ${goToM}`}>
                Go
              </button>
              <button className="btn" disabled={!truncated} onClick={() => graphRef.current?.showAll()}>
                Show All
              </button>
            </div>
          </div>
        </details>

        <div className="hint" role="note" aria-label="Keyboard shortcuts and tips">
          Tips: Right‑click canvas to cancel selection. Hotkeys: S new • R random • A select •
          Esc cancel • B boundary • T labels • C center • G go • +/- zoom
        </div>
      </aside>
    </div>
  )
}
