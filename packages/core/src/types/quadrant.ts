export const Quadrant = {
  DoFirst: 'do-first',
  Schedule: 'schedule',
  Delegate: 'delegate',
  Eliminate: 'eliminate',
} as const;

export type Quadrant = (typeof Quadrant)[keyof typeof Quadrant];

/** Section titles used in exports and the CLI */
export const QuadrantName: Record<Quadrant, string> = {
  [Quadrant.DoFirst]: 'Do First',
  [Quadrant.Schedule]: 'Schedule',
  [Quadrant.Delegate]: 'Delegate',
  [Quadrant.Eliminate]: 'Eliminate',
};

/** Fixed display and export order */
export const QUADRANT_ORDER: readonly Quadrant[] = [
  Quadrant.DoFirst,
  Quadrant.Schedule,
  Quadrant.Delegate,
  Quadrant.Eliminate,
];
