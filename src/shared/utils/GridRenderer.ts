import {
  EMPTY_GLYPH,
  GROUP_GLYPHS,
} from "../constants/SimulationEnums";
import type { GridSnapshot } from "../../domain/simulation/grid/GridSnapshot";

/**
 * Text frame of a snapshot: one line per row, `R`/`B` for occupants and
 * `.` for empty cells.
 */
export function renderSnapshot(snapshot: GridSnapshot): string {
  const lines: string[] = [];
  for (let row = 0; row < snapshot.height; row++) {
    let line = "";
    for (let col = 0; col < snapshot.width; col++) {
      const occupant = snapshot.at({ row, col });
      line += occupant ? GROUP_GLYPHS[occupant.group] : EMPTY_GLYPH;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
