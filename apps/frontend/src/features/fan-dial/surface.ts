import type { Color } from "./config";

export type FontWeight = "normal" | "bold";

/**
 * Drawing target for the dial. The dial only issues draw calls; the host
 * owns the surface and reports its size.
 */
export interface DialSurface {
  readonly width: number;
  readonly height: number;
  drawFilledCircle(cx: number, cy: number, radius: number, color: Color): void;
  drawCenteredText(
    text: string,
    x: number,
    y: number,
    color: Color,
    fontSize: number,
    fontWeight: FontWeight,
  ): void;
}
