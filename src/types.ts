export interface GraphMeta {
  total_vertices: number;
  edges: number;
  periphery_size: number;
}

/** Summary pushed to the dock after every engine command. */
export interface GraphInfo {
  V: number;
  E: number;
  periphery: number;
  selection: string;
  truncation: number;
}

export type LabelMode = 'index' | 'color';
