import { Cell, Direction } from '../../shared/types.js';
import { GRID_WIDTH, GRID_HEIGHT } from '../../shared/constants.js';

const UNIT: Record<Direction, Cell> = {
  UP: { x: 0, y: -1 },
  DOWN: { x: 0, y: 1 },
  LEFT: { x: -1, y: 0 },
  RIGHT: { x: 1, y: 0 },
};

const OPPOSITE: Record<Direction, Direction> = {
  UP: 'DOWN',
  DOWN: 'UP',
  LEFT: 'RIGHT',
  RIGHT: 'LEFT',
};

export function cellKey(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function inBounds(cell: Cell): boolean {
  return cell.x >= 0 && cell.x < GRID_WIDTH && cell.y >= 0 && cell.y < GRID_HEIGHT;
}

export function clampToGrid(cell: Cell): Cell {
  return {
    x: Math.min(GRID_WIDTH - 1, Math.max(0, cell.x)),
    y: Math.min(GRID_HEIGHT - 1, Math.max(0, cell.y)),
  };
}

export function step(cell: Cell, direction: Direction, distance: number = 1): Cell {
  const unit = UNIT[direction];
  return { x: cell.x + unit.x * distance, y: cell.y + unit.y * distance };
}

export function opposite(direction: Direction): Direction {
  return OPPOSITE[direction];
}

/** The two headings at right angles to `direction`. */
export function perpendiculars(direction: Direction): [Direction, Direction] {
  return direction === 'UP' || direction === 'DOWN' ? ['LEFT', 'RIGHT'] : ['UP', 'DOWN'];
}

/** Distance to the nearest wall (0 on the border row/column). */
export function wallDistance(cell: Cell): number {
  return Math.min(cell.x, cell.y, GRID_WIDTH - 1 - cell.x, GRID_HEIGHT - 1 - cell.y);
}

/** Square block of cells around `center`, clipped to the grid. */
export function neighborhood(center: Cell, radius: number): Cell[] {
  const cells: Cell[] = [];
  for (let y = center.y - radius; y <= center.y + radius; y++) {
    for (let x = center.x - radius; x <= center.x + radius; x++) {
      const cell = { x, y };
      if (inBounds(cell)) cells.push(cell);
    }
  }
  return cells;
}
