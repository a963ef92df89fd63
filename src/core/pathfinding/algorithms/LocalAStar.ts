// Bounded A* over an 8-directional lattice anchored at the start position.
// Lattice points are start + (i * step, j * step); Z is held at start.z.

import type { Position } from "../../world/Position";
import { distance } from "../../world/Position";
import type { DirectPathOptions } from "../DirectPath";
import { directPath } from "../DirectPath";
import type { PathFinder } from "../types";
import { MinHeap } from "./MinHeap";

export interface LocalAStarConfig {
  stepSize: number;
  goalThreshold: number;
  searchMargin: number;
  maxIterations: number;
  worldSize: number;
  direct: DirectPathOptions;
}

interface SearchNode {
  key: string;
  i: number;
  j: number;
  position: Position;
  g: number;
  h: number;
  f: number;
  seq: number;
}

interface SearchBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

const GOAL_KEY = "goal";
const GOAL_INDEX = Number.MAX_SAFE_INTEGER;

// f first, then lattice coordinates, then insertion order. Never a hash.
function compareNodes(a: SearchNode, b: SearchNode): number {
  return a.f - b.f || a.i - b.i || a.j - b.j || a.seq - b.seq;
}

export class LocalAStar implements PathFinder {
  private readonly snapRadius: number;

  constructor(private readonly config: LocalAStarConfig) {
    this.snapRadius = config.stepSize * Math.SQRT2;
  }

  findPath(start: Position, goal: Position): Position[] {
    return (
      this.search(start, goal) ?? directPath(start, goal, this.config.direct)
    );
  }

  /**
   * Runs the search. Returns null when the open set is exhausted or the
   * iteration cap is hit; findPath() turns that into a straight line.
   */
  search(start: Position, goal: Position): Position[] | null {
    const { stepSize, goalThreshold } = this.config;

    if (distance(start, goal) < goalThreshold) {
      return [start];
    }

    const bounds = this.boundsFor(start, goal);
    const open = new MinHeap<SearchNode>(compareNodes);
    const gScore = new Map<string, number>();
    const cameFrom = new Map<string, SearchNode | null>();
    const closed = new Set<string>();
    let seq = 0;

    const startH = distance(start, goal);
    const startNode: SearchNode = {
      key: "0,0",
      i: 0,
      j: 0,
      position: start,
      g: 0,
      h: startH,
      f: startH,
      seq: seq++,
    };
    gScore.set(startNode.key, 0);
    cameFrom.set(startNode.key, null);
    open.push(startNode);

    let iterations = this.config.maxIterations;

    while (!open.isEmpty()) {
      if (--iterations < 0) {
        return null;
      }

      const current = open.pop();
      if (current === undefined) break;
      if (closed.has(current.key)) continue;
      closed.add(current.key);

      if (distance(current.position, goal) < goalThreshold) {
        return this.buildPath(current, cameFrom);
      }

      const relax = (node: SearchNode, parent: SearchNode): void => {
        if (closed.has(node.key)) return;
        const known = gScore.get(node.key);
        if (known !== undefined && node.g >= known) return;
        gScore.set(node.key, node.g);
        cameFrom.set(node.key, parent);
        open.push(node);
      };

      for (let di = -1; di <= 1; di++) {
        for (let dj = -1; dj <= 1; dj++) {
          if (di === 0 && dj === 0) continue;

          const i = current.i + di;
          const j = current.j + dj;
          const position: Position = {
            x: start.x + i * stepSize,
            y: start.y + j * stepSize,
            z: start.z,
          };
          if (!this.inBounds(position, bounds)) continue;

          const g = current.g + distance(current.position, position);
          const h = distance(position, goal);
          relax(
            { key: `${i},${j}`, i, j, position, g, h, f: g + h, seq: seq++ },
            current,
          );
        }
      }

      // The lattice may never come within the threshold of an off-grid
      // goal, so the goal itself is reachable from any node one step away.
      const toGoal = distance(current.position, goal);
      if (toGoal <= this.snapRadius) {
        const g = current.g + toGoal;
        relax(
          {
            key: GOAL_KEY,
            i: GOAL_INDEX,
            j: GOAL_INDEX,
            position: goal,
            g,
            h: 0,
            f: g,
            seq: seq++,
          },
          current,
        );
      }
    }

    return null;
  }

  private boundsFor(start: Position, goal: Position): SearchBounds {
    const margin = this.config.searchMargin;
    const half = this.config.worldSize / 2;
    return {
      minX: Math.max(-half, Math.min(start.x, goal.x) - margin),
      maxX: Math.min(half, Math.max(start.x, goal.x) + margin),
      minY: Math.max(-half, Math.min(start.y, goal.y) - margin),
      maxY: Math.min(half, Math.max(start.y, goal.y) + margin),
    };
  }

  private inBounds(p: Position, b: SearchBounds): boolean {
    return p.x >= b.minX && p.x <= b.maxX && p.y >= b.minY && p.y <= b.maxY;
  }

  private buildPath(
    goalNode: SearchNode,
    cameFrom: Map<string, SearchNode | null>,
  ): Position[] {
    const path: Position[] = [];
    let current: SearchNode | null | undefined = goalNode;

    while (current) {
      path.push(current.position);
      current = cameFrom.get(current.key);
    }

    path.reverse();
    return path;
  }
}
