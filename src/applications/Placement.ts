import type { Digit } from '../Digit.ts';
import type { Position } from '../Position.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';

import { TechniqueApplication } from './TechniqueApplication.ts';

export class Placement extends TechniqueApplication {
  public readonly kind = 'placement';

  public constructor(public readonly position: Position, public readonly digit: Digit) {
    super();
  }

  public applyTo(grid: TechniqueGrid): boolean {
    return grid.place(this.position, this.digit);
  }

  public toString(): string {
    return `${this.position.toString()}=${String(this.digit)}`;
  }
}
