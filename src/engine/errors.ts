export type InvalidBoundaryVertex = {
  readonly type: 'InvalidBoundaryVertex'
  readonly vertices: readonly number[]
  readonly reason: 'not-on-periphery' | 'degenerate-arc'
}

export type EmptyGraph = { readonly type: 'EmptyGraph' }

export type GraphError = InvalidBoundaryVertex | EmptyGraph

export function invalidBoundaryVertex(vertices: readonly number[], reason: InvalidBoundaryVertex['reason']): InvalidBoundaryVertex {
  return { type: 'InvalidBoundaryVertex', vertices: [...vertices], reason }
}

export function emptyGraph(): EmptyGraph {
  return { type: 'EmptyGraph' }
}

export function describeGraphError(err: GraphError): string {
  switch (err.type) {
    case 'EmptyGraph':
      return 'Graph has no periphery yet'
    case 'InvalidBoundaryVertex':
      return err.reason === 'degenerate-arc'
        ? `Arc ${err.vertices.join('→')} is degenerate`
        : `Vertex ${err.vertices.join(', ')} not on periphery`
  }
}
