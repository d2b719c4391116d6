/** Center-based box in image pixels. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const left = (box: BoundingBox): number => box.x - box.width / 2;
export const right = (box: BoundingBox): number => box.x + box.width / 2;
export const top = (box: BoundingBox): number => box.y - box.height / 2;
export const bottom = (box: BoundingBox): number => box.y + box.height / 2;

export const area = (box: BoundingBox): number => box.width * box.height;

/** Signed width of the horizontal intersection; negative when the boxes are apart. */
export function horizontalOverlap(a: BoundingBox, b: BoundingBox): number {
  return Math.min(right(a), right(b)) - Math.max(left(a), left(b));
}

/** Signed height of the vertical intersection; negative when the boxes are apart. */
export function verticalOverlap(a: BoundingBox, b: BoundingBox): number {
  return Math.min(bottom(a), bottom(b)) - Math.max(top(a), top(b));
}

export function overlapArea(a: BoundingBox, b: BoundingBox): number {
  const width = horizontalOverlap(a, b);
  const height = verticalOverlap(a, b);
  if (width <= 0 || height <= 0) return 0;
  return width * height;
}

/**
 * Share of `a` covered by `b`. Not symmetric: a small box fully inside a large
 * one scores 1 while the large box scores its area fraction.
 */
export function overlapRatio(a: BoundingBox, b: BoundingBox): number {
  const boxArea = area(a);
  if (boxArea <= 0) return 0;
  return overlapArea(a, b) / boxArea;
}

/** Gap between the facing edges is below the threshold, or one vertical span holds the other. */
export function verticallyClose(a: BoundingBox, b: BoundingBox, proximityPx: number): boolean {
  const aTop = top(a);
  const aBottom = bottom(a);
  const bTop = top(b);
  const bBottom = bottom(b);
  const gap = Math.max(aTop, bTop) - Math.min(aBottom, bBottom);

  return (
    gap < proximityPx ||
    (aTop >= bTop && aBottom <= bBottom) ||
    (bTop >= aTop && bBottom <= aBottom)
  );
}

export function containsPoint(box: BoundingBox, x: number, y: number): boolean {
  return x >= left(box) && x <= right(box) && y >= top(box) && y <= bottom(box);
}

export function hasPositiveExtent(box: BoundingBox): boolean {
  return box.width > 0 && box.height > 0;
}
