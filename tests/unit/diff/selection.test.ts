import { describe, it, expect } from 'vitest';
import { DiffSelection, getSelectableLines } from '../../../src/diff/selection.js';
import { modifiedFileDiff } from './helpers.js';

describe('getSelectableLines', () => {
  it('should list the absolute index of every add and delete', () => {
    expect(getSelectableLines(modifiedFileDiff())).toEqual(new Set([2, 3, 4, 9]));
  });
});

describe('DiffSelection', () => {
  describe('bound to a diff', () => {
    it('should start with nothing selected', () => {
      const selection = DiffSelection.forDiff(modifiedFileDiff());

      expect(selection.getSelectionType()).toBe('none');
      expect(selection.getSelectedLines()).toEqual([]);
    });

    it('should select single lines', () => {
      const selection = DiffSelection.forDiff(modifiedFileDiff()).withLineSelection(3, true);

      expect(selection.isSelected(3)).toBe(true);
      expect(selection.getSelectionType()).toBe('partial');
      expect(selection.getSelectedLines()).toEqual([3]);
    });

    it('should ignore lines that cannot be selected', () => {
      const selection = DiffSelection.forDiff(modifiedFileDiff()).withLineSelection(1, true);

      expect(selection.isSelectable(1)).toBe(false);
      expect(selection.isSelected(1)).toBe(false);
      expect(selection.getSelectionType()).toBe('none');
    });

    it('should deselect lines from a full selection', () => {
      const selection = DiffSelection.forDiff(modifiedFileDiff(), 'all').withLineSelection(4, false);

      expect(selection.getSelectionType()).toBe('partial');
      expect(selection.getSelectedLines()).toEqual([2, 3, 9]);
    });

    it('should select ranges', () => {
      const partial = DiffSelection.forDiff(modifiedFileDiff()).withRangeSelection(2, 3, true);
      expect(partial.getSelectedLines()).toEqual([2, 3, 4]);
      expect(partial.getSelectionType()).toBe('partial');

      expect(partial.withLineSelection(9, true).getSelectionType()).toBe('all');
    });

    it('should select and clear everything', () => {
      const selection = DiffSelection.forDiff(modifiedFileDiff()).withLineSelection(2, true);

      expect(selection.withSelectAll().getSelectedLines()).toEqual([2, 3, 4, 9]);
      expect(selection.withSelectNone().getSelectionType()).toBe('none');
    });

    it('should not change the original selection', () => {
      const original = DiffSelection.forDiff(modifiedFileDiff());
      original.withLineSelection(2, true);

      expect(original.isSelected(2)).toBe(false);
    });
  });

  describe('without a diff', () => {
    it('should treat every line as selected after all()', () => {
      const selection = DiffSelection.all();

      expect(selection.isSelected(999)).toBe(true);
      expect(selection.getSelectionType()).toBe('all');
    });

    it('should only know explicitly toggled lines', () => {
      const deselected = DiffSelection.all().withLineSelection(5, false);
      expect(deselected.getSelectionType()).toBe('partial');
      expect(deselected.getSelectedLines()).toEqual([]);

      const selected = DiffSelection.empty().withLineSelection(5, true);
      expect(selected.getSelectionType()).toBe('partial');
      expect(selected.getSelectedLines()).toEqual([5]);
    });

    it('should drop entries that match the default again', () => {
      const selection = DiffSelection.empty().withLineSelection(5, true).withLineSelection(5, false);
      expect(selection.getSelectionType()).toBe('none');
    });

    it('should keep toggled lines when bound to a diff later', () => {
      const selection = DiffSelection.empty().withLineSelection(2, true);

      expect(selection.withSelectableLines([2, 3]).getSelectionType()).toBe('partial');
      expect(selection.withSelectableLines([2]).getSelectionType()).toBe('all');
    });
  });

  it('should count an empty selectable set as both all and none selected', () => {
    const selection = DiffSelection.all([]);

    expect(selection.areAllSelected()).toBe(true);
    expect(selection.areNoneSelected()).toBe(true);
    expect(selection.getSelectionType()).toBe('all');
  });
});
