export type Viewport = {
  scrollOffset: number;
  width: number;
  maxRows: number;
};

export const toViewport = (scrollOffset: number, width: number, maxRows: number): Viewport => ({
  scrollOffset: Math.max(0, Math.floor(scrollOffset)),
  width: Math.max(1, Math.floor(width)),
  maxRows: Math.max(1, Math.floor(maxRows))
});
