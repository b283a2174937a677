/** Points for destroying an obstacle: smaller obstacles are worth more. */
export function scoreForHit(radius: number, maxRadius: number): number {
  return 2 * maxRadius - radius;
}
