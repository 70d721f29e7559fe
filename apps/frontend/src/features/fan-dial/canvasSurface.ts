/**
 * `DialSurface` backed by a 2D canvas context.
 */

import type { Color } from "./config";
import type { DialSurface, FontWeight } from "./surface";

/** The slice of `CanvasRenderingContext2D` the surface draws with. */
export type DialCanvasContext = Pick<
  CanvasRenderingContext2D,
  "fillStyle" | "font" | "textAlign" | "textBaseline" | "beginPath" | "arc" | "fill" | "fillText"
>;

const FONT_FAMILY = "sans-serif";

export function createCanvasSurface(
  ctx: DialCanvasContext,
  width: number,
  height: number,
): DialSurface {
  return {
    width,
    height,

    drawFilledCircle(cx: number, cy: number, radius: number, color: Color) {
      ctx.fillStyle = color;
      ctx.beginPath();
      ctx.arc(cx, cy, radius, 0, Math.PI * 2);
      ctx.fill();
    },

    drawCenteredText(
      text: string,
      x: number,
      y: number,
      color: Color,
      fontSize: number,
      fontWeight: FontWeight,
    ) {
      ctx.fillStyle = color;
      ctx.font = `${fontWeight} ${fontSize}px ${FONT_FAMILY}`;
      ctx.textAlign = "center";
      ctx.textBaseline = "alphabetic";
      ctx.fillText(text, x, y);
    },
  };
}
