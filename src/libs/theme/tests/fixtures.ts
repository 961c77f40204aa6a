import type { Color } from "../../../types/palette";

export const BLACK: Color = [10, 10, 10];
export const WHITE: Color = [250, 250, 250];
export const RED: Color = [200, 30, 30];
export const GREEN: Color = [30, 200, 30];
export const BLUE: Color = [30, 30, 200];
export const YELLOW: Color = [200, 200, 30];
export const MAGENTA: Color = [200, 30, 200];
export const CYAN: Color = [30, 200, 200];

export const SCENARIO: Color[] = [BLACK, WHITE, RED, GREEN, BLUE, YELLOW, MAGENTA, CYAN];
