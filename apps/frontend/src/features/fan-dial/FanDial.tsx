import { cn } from "@/lib/cn";
import { useEffect, useId, useLayoutEffect, useRef, useState, useSyncExternalStore } from "react";
import type { MouseEvent } from "react";

import { createCanvasSurface } from "./canvasSurface";
import type { DialColorConfig } from "./config";
import { DialController } from "./DialController";
import type { FanSpeed } from "./speeds";
import { createStringLookup } from "./strings";
import type { StringLookup } from "./strings";

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

interface FanDialProps {
  /** Read once on mount; the dial's colors never change afterwards. */
  colors?: DialColorConfig;
  /** Read once on mount. Defaults to the built-in string table. */
  lookup?: StringLookup;
  width?: number;
  height?: number;
  /** Runs before the dial advances. Call `preventDefault()` to keep the current speed. */
  onClick?: (event: MouseEvent<HTMLButtonElement>) => void;
  onSpeedChange?: (speed: FanSpeed) => void;
  className?: string;
}

/* --------------------------------------------------------------------------
   Component
   -------------------------------------------------------------------------- */

export function FanDial({
  colors,
  lookup,
  width = 240,
  height = 240,
  onClick,
  onSpeedChange,
  className,
}: FanDialProps) {
  const [controller] = useState(
    () => new DialController({ colors, lookup: lookup ?? createStringLookup() }),
  );
  const state = useSyncExternalStore(controller.subscribe, controller.getSnapshot);
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const actionId = useId();

  /* Bounds first, so the first paint already has a radius */
  useLayoutEffect(() => {
    controller.resize(width, height);
  }, [controller, width, height]);

  /* Repaint whenever the state or the bounds change */
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext("2d");
    if (!ctx) return;

    // HiDPI scale
    const ratio = window.devicePixelRatio || 1;
    canvas.width = Math.floor(width * ratio);
    canvas.height = Math.floor(height * ratio);
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.scale(ratio, ratio);
    ctx.clearRect(0, 0, width, height);

    controller.render(createCanvasSurface(ctx, width, height));
  }, [controller, state, width, height]);

  const handleClick = (event: MouseEvent<HTMLButtonElement>) => {
    onClick?.(event);
    const before = controller.currentSpeed();
    controller.activate(event.defaultPrevented);

    const after = controller.currentSpeed();
    if (after !== before) onSpeedChange?.(after);
  };

  return (
    <button
      type="button"
      aria-label={state.description}
      aria-describedby={actionId}
      onClick={handleClick}
      className={cn(
        "inline-flex rounded-full p-0",
        "focus-visible:outline-2 focus-visible:outline-offset-2 focus-visible:outline-[var(--color-border-focus)]",
        className,
      )}
    >
      <canvas ref={canvasRef} aria-hidden="true" style={{ width, height }} />
      <span id={actionId} className="sr-only">
        {state.actionLabel}
      </span>
    </button>
  );
}
