// src/common/ControlledSlider.tsx
// Reusable controlled slider
// - look: track / fill / thumb drawn with divs
// - interaction: a transparent native <input type="range"> on top
// - controlled: value comes in through props, changes go out through onChange

import React from "react";

type Props = {
  label: string;
  value: number;
  min: number;
  max: number;
  step?: number;
  // shown next to the label; defaults to String(value)
  format?: (value: number) => string;
  onChange: (next: number) => void;
};

// position of value on the track, clamped to [0, 1]
export function sliderFraction(value: number, min: number, max: number): number {
  const denom = max - min;
  if (!(denom > 0)) {
    return 0;
  }
  const pct = (value - min) / denom;
  if (pct < 0) {
    return 0;
  }
  if (pct > 1) {
    return 1;
  }
  return pct;
}

export function ControlledSlider(props: Props) {
  const { label, value, min, max, step, format, onChange } = props;

  const leftPercent = `${sliderFraction(value, min, max) * 100}%`;
  const shown = format ? format(value) : String(value);

  function handleChange(e: React.ChangeEvent<HTMLInputElement>) {
    const next = Number(e.currentTarget.value);
    if (Number.isFinite(next)) {
      onChange(next);
    }
  }

  return (
    <div style={{ width: 260 }}>
      <div style={{ marginBottom: 8, fontSize: 14 }}>
        <span>{`${label}: `}</span>
        <span>{shown}</span>
      </div>

      <div style={{ position: "relative", height: 28, display: "flex", alignItems: "center" }}>
        {/* track */}
        <div
          style={{
            position: "relative",
            width: "100%",
            height: 8,
            borderRadius: 999,
            background: "rgba(0,0,0,0.08)",
          }}
        >
          {/* fill */}
          <div
            style={{
              position: "absolute",
              left: 0,
              top: 0,
              height: "100%",
              width: leftPercent,
              borderRadius: 999,
              background: "rgba(0,0,0,0.35)",
            }}
          />
          {/* thumb */}
          <div
            style={{
              position: "absolute",
              top: "50%",
              left: leftPercent,
              transform: "translate(-50%, -50%)",
              width: 16,
              height: 16,
              borderRadius: 999,
              background: "white",
              boxShadow: "0 1px 6px rgba(0,0,0,0.35)",
            }}
          />
        </div>

        {/* transparent input doing the actual work */}
        <input
          type="range"
          aria-label={label}
          min={min}
          max={max}
          step={step}
          value={value}
          onChange={handleChange}
          style={{
            position: "absolute",
            inset: 0,
            width: "100%",
            height: "100%",
            opacity: 0,
            cursor: "pointer",
          }}
        />
      </div>
    </div>
  );
}
