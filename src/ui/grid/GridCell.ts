/**
 * GridCell - 선택/하이라이트 플래그를 가진 셀 핸들
 */

import type { SelectableCell } from '../../types';

export class GridCell implements SelectableCell {
  private selected = false;
  private highlighted = false;

  constructor(
    readonly row: number,
    readonly column: number
  ) {}

  get isSelected(): boolean {
    return this.selected;
  }

  get isHighlighted(): boolean {
    return this.highlighted;
  }

  setSelected(selected: boolean): void {
    this.selected = selected;
  }

  setHighlighted(highlighted: boolean): void {
    this.highlighted = highlighted;
  }
}
