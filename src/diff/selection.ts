/**
 * Line selection over a unified diff
 */

import type { DiffSelectionType, TextDiff } from './types.js';

/**
 * Immutable selection of diff lines
 *
 * Only lines whose state differs from the default are recorded. A fresh
 * selection defaults to excluding every line; `withSelectAll` flips the
 * default. When the set of selectable lines (adds and deletes) is known,
 * lines outside it are never selected and the all/none queries are answered
 * against it.
 */
export class DiffSelection {
  private constructor(
    private readonly defaultSelected: boolean,
    private readonly divergingLines: ReadonlyMap<number, boolean>,
    private readonly selectableLines: ReadonlySet<number> | undefined
  ) {}

  /**
   * A selection with nothing selected
   */
  static empty(selectableLines?: Iterable<number>): DiffSelection {
    return new DiffSelection(false, new Map(), toSet(selectableLines));
  }

  /**
   * A selection with every selectable line selected
   */
  static all(selectableLines?: Iterable<number>): DiffSelection {
    return new DiffSelection(true, new Map(), toSet(selectableLines));
  }

  /**
   * Selection over the add and delete lines of a diff
   */
  static forDiff(diff: TextDiff, type: 'all' | 'none' = 'none'): DiffSelection {
    const lines = getSelectableLines(diff);
    return type === 'all' ? DiffSelection.all(lines) : DiffSelection.empty(lines);
  }

  isSelected(lineIndex: number): boolean {
    if (!this.isSelectable(lineIndex)) return false;
    return this.divergingLines.get(lineIndex) ?? this.defaultSelected;
  }

  /**
   * Whether the line can be toggled; always true when no selectable set is known
   */
  isSelectable(lineIndex: number): boolean {
    return this.selectableLines === undefined || this.selectableLines.has(lineIndex);
  }

  areAllSelected(): boolean {
    if (this.selectableLines === undefined) {
      return this.defaultSelected && !this.hasDiverging(false);
    }
    for (const line of this.selectableLines) {
      if (!this.isSelected(line)) return false;
    }
    return true;
  }

  areNoneSelected(): boolean {
    if (this.selectableLines === undefined) {
      return !this.defaultSelected && !this.hasDiverging(true);
    }
    for (const line of this.selectableLines) {
      if (this.isSelected(line)) return false;
    }
    return true;
  }

  getSelectionType(): DiffSelectionType {
    if (this.areAllSelected()) return 'all';
    if (this.areNoneSelected()) return 'none';
    return 'partial';
  }

  /**
   * Indices of the selected lines, ascending
   *
   * Without a selectable set only explicitly toggled lines are known.
   */
  getSelectedLines(): number[] {
    const candidates = this.selectableLines ?? this.divergingLines.keys();
    return Array.from(candidates)
      .filter((line) => this.isSelected(line))
      .sort((a, b) => a - b);
  }

  withLineSelection(lineIndex: number, selected: boolean): DiffSelection {
    return this.withRangeSelection(lineIndex, 1, selected);
  }

  /**
   * Toggle `length` consecutive lines starting at `from`
   */
  withRangeSelection(from: number, length: number, selected: boolean): DiffSelection {
    const next = new Map(this.divergingLines);
    for (let line = from; line < from + length; line++) {
      if (!this.isSelectable(line)) continue;
      if (selected === this.defaultSelected) {
        next.delete(line);
      } else {
        next.set(line, selected);
      }
    }
    return new DiffSelection(this.defaultSelected, next, this.selectableLines);
  }

  withSelectAll(): DiffSelection {
    return new DiffSelection(true, new Map(), this.selectableLines);
  }

  withSelectNone(): DiffSelection {
    return new DiffSelection(false, new Map(), this.selectableLines);
  }

  /**
   * Same selection, bound to the selectable lines of a concrete diff
   */
  withSelectableLines(selectableLines: Iterable<number>): DiffSelection {
    return new DiffSelection(this.defaultSelected, this.divergingLines, new Set(selectableLines));
  }

  private hasDiverging(value: boolean): boolean {
    for (const selected of this.divergingLines.values()) {
      if (selected === value) return true;
    }
    return false;
  }
}

function toSet(lines: Iterable<number> | undefined): Set<number> | undefined {
  return lines !== undefined ? new Set(lines) : undefined;
}

/**
 * Absolute indices of every add and delete line in a diff
 */
export function getSelectableLines(diff: TextDiff): Set<number> {
  const lines = new Set<number>();
  for (const hunk of diff.hunks) {
    hunk.lines.forEach((line, i) => {
      if (line.type === 'add' || line.type === 'delete') {
        lines.add(hunk.unifiedDiffStart + i);
      }
    });
  }
  return lines;
}
