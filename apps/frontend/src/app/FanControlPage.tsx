import { useState } from "react";

import { FanDial, createStringLookup, dialColorsFromEnv, speedLabel } from "@/features/fan-dial";
import type { FanSpeed } from "@/features/fan-dial";
import { cn } from "@/lib/cn";
import { Fan, RotateCcw } from "@/tokens/icons";

const DIAL_COLORS = dialColorsFromEnv(import.meta.env);
const LOOKUP = createStringLookup();

export function FanControlPage() {
  const [speed, setSpeed] = useState<FanSpeed>("OFF");
  const [dialKey, setDialKey] = useState(0);

  /* Remounting the dial is the only way back to OFF without cycling */
  const reset = () => {
    setDialKey((key) => key + 1);
    setSpeed("OFF");
  };

  return (
    <main className="flex min-h-screen flex-col items-center justify-center gap-6 p-8">
      <header className="flex items-center gap-2">
        <Fan size={24} aria-hidden="true" />
        <h1 className="text-xl font-semibold">Fan control</h1>
      </header>

      <FanDial
        key={dialKey}
        colors={DIAL_COLORS}
        lookup={LOOKUP}
        width={320}
        height={320}
        onSpeedChange={setSpeed}
      />

      <div className="flex items-center gap-3">
        <p role="status" className="text-base">
          Fan speed: {LOOKUP(speedLabel(speed))}
        </p>
        <button
          type="button"
          onClick={reset}
          disabled={speed === "OFF"}
          className={cn(
            "inline-flex items-center gap-1 rounded-md px-2 py-1 text-sm",
            speed === "OFF" ? "opacity-50 cursor-not-allowed" : "cursor-pointer",
          )}
        >
          <RotateCcw size={14} aria-hidden="true" />
          Turn off
        </button>
      </div>
    </main>
  );
}
