export { resolveJoinGraph } from './join-graph-resolver';
export { compareJoinEdges, sortJoinEdges } from './join-edge-comparator';
export type { JoinPlan, JoinStep } from './types';
