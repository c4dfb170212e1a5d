import type { ILogObj, Logger } from "tslog";
import { PlanValidationError, UnknownPlanItemError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import type { PlanItem, PlanItemStatus } from "./types.js";

const STATUS_MARKERS: Record<PlanItemStatus, string> = {
  pending: "[ ]",
  in_progress: "[~]",
  completed: "[x]",
  cancelled: "[-]",
};

/**
 * The session's todo list. Holds current state only; earlier plans are
 * recoverable from the Turn history, not from here.
 *
 * Invariant: at most one item is `in_progress` at any time.
 */
export class TaskPlanner {
  private items: PlanItem[] = [];
  private readonly logger: Logger<ILogObj>;

  constructor(initial: readonly PlanItem[] = [], logger?: Logger<ILogObj>) {
    this.logger = logger ?? createLogger({ name: "halyard:planner" });
    if (initial.length > 0) {
      this.setPlan(initial);
    }
  }

  /**
   * Replaces the whole list. Items with a `rank` are ordered by it (stable);
   * only the first `in_progress` item keeps that status, later ones become
   * `pending`.
   *
   * @throws PlanValidationError on duplicate ids
   */
  setPlan(items: readonly PlanItem[]): void {
    const seen = new Set<string>();
    for (const item of items) {
      if (seen.has(item.id)) {
        throw new PlanValidationError(`Duplicate plan item id: ${item.id}`);
      }
      seen.add(item.id);
    }

    const ordered = items
      .map((item, index) => ({ item, index }))
      .sort((a, b) => {
        const rankA = a.item.rank ?? Number.POSITIVE_INFINITY;
        const rankB = b.item.rank ?? Number.POSITIVE_INFINITY;
        return rankA === rankB ? a.index - b.index : rankA - rankB;
      })
      .map(({ item }) => ({ ...item }));

    let focus: string | undefined;
    for (const item of ordered) {
      if (item.status !== "in_progress") continue;
      if (focus === undefined) {
        focus = item.id;
      } else {
        this.logger.debug(`Demoting plan item ${item.id}: ${focus} is already in progress`);
        item.status = "pending";
      }
    }

    this.items = ordered;
  }

  /**
   * Sets an item's status. Marking an item `in_progress` demotes any other
   * in-progress item to `pending`.
   *
   * @throws UnknownPlanItemError if no item has this id
   */
  updateItem(id: string, status: PlanItemStatus): void {
    const target = this.items.find((item) => item.id === id);
    if (!target) {
      throw new UnknownPlanItemError(id);
    }

    if (status === "in_progress") {
      for (const item of this.items) {
        if (item !== target && item.status === "in_progress") {
          this.logger.debug(`Demoting plan item ${item.id} in favour of ${id}`);
          item.status = "pending";
        }
      }
    }

    target.status = status;
  }

  /**
   * Appends an item (or inserts it at `position`). Same focus rule as
   * `updateItem` when the new item is `in_progress`.
   *
   * @throws PlanValidationError if the id is taken
   */
  addItem(item: PlanItem, position?: number): void {
    if (this.items.some((existing) => existing.id === item.id)) {
      throw new PlanValidationError(`Duplicate plan item id: ${item.id}`);
    }
    const index = position === undefined ? this.items.length : Math.max(0, Math.min(position, this.items.length));
    this.items.splice(index, 0, { ...item, status: "pending" });
    this.updateItem(item.id, item.status);
  }

  /**
   * @throws UnknownPlanItemError if no item has this id
   */
  removeItem(id: string): void {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) {
      throw new UnknownPlanItemError(id);
    }
    this.items.splice(index, 1);
  }

  /**
   * Read-only ordered view. Later mutations do not show through.
   */
  snapshot(): readonly Readonly<PlanItem>[] {
    return Object.freeze(this.items.map((item) => Object.freeze({ ...item })));
  }

  /** Items still `pending` or `in_progress` */
  unfinished(): readonly Readonly<PlanItem>[] {
    return this.snapshot().filter(
      (item) => item.status === "pending" || item.status === "in_progress",
    );
  }

  /**
   * Checklist text, one line per item.
   *
   * @example
   * ```
   * [x] 1. Read the failing test
   * [~] 2. Fix the parser (high)
   * [ ] 3. Run the suite
   * ```
   */
  render(): string {
    if (this.items.length === 0) {
      return "(no plan items)";
    }
    return this.items
      .map((item) => {
        const priority = item.priority ? ` (${item.priority})` : "";
        return `${STATUS_MARKERS[item.status]} ${item.id}. ${item.description}${priority}`;
      })
      .join("\n");
  }
}
