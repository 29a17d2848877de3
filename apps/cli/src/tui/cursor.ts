export type CursorKey = "up" | "down" | "left" | "right";

/**
 * Move the board cursor one square. Up is toward the top row, which holds
 * the highest indices. The cursor stops at the edges.
 */
export function moveCursor(location: number, size: number, key: CursorKey): number {
  const row = Math.floor(location / size);
  const col = location % size;
  switch (key) {
    case "up":
      return row < size - 1 ? location + size : location;
    case "down":
      return row > 0 ? location - size : location;
    case "left":
      return col > 0 ? location - 1 : location;
    case "right":
      return col < size - 1 ? location + 1 : location;
  }
}
