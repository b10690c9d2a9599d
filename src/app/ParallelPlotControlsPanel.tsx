// src/app/ParallelPlotControlsPanel.tsx

// ------------------------------------------------------------
//  ControlsPanel: plain UI
//  - renders ControlsState as checkboxes, selects, a slider and inputs
//  - reports user edits upward through callbacks
//
//  Scope:
//  - does not create the controller or the model
//  - does not build scenes
// ------------------------------------------------------------

import React from "react";

import { ControlledSlider } from "../common/ControlledSlider";
import { COLORMAP_NAMES, isColormapName, type ColormapName } from "../lib/colormap";
import type { LegendVisibility } from "../lib/features";
import type { PlotAttributes } from "../lib/plotConfig";

const LEGEND_OPTIONS: readonly LegendVisibility[] = ["auto", "show", "hide"];

export const CURVE_STEPS_MIN = 2;
export const CURVE_STEPS_MAX = 60;

export type ControlsState = {
  title: string;
  // displayed features, in column order
  selected: string[];
  // "" = default (last displayed feature)
  colorFeature: string;
  colormap: ColormapName;
  curve: boolean;
  curveSteps: number;
  normalize: boolean;
  showColorLegend: LegendVisibility;
  exportFileName: string;
};

// ControlsState -> the attribute patch the controller takes
export function controlsToAttributes(state: ControlsState): Partial<PlotAttributes> {
  return {
    title: state.title,
    featureSelection: [...state.selected],
    colorFeature: state.colorFeature === "" ? undefined : state.colorFeature,
    colormap: state.colormap,
    curve: state.curve,
    curveSteps: state.curveSteps,
    normalize: state.normalize,
    showColorLegend: state.showColorLegend,
  };
}

// toggles `name` in the selection, keeping the dataset's column order
export function toggleFeature(
  columns: readonly string[],
  selected: readonly string[],
  name: string,
): string[] {
  const next: string[] = [];
  let i = 0;
  while (i < columns.length) {
    const column = columns[i];
    const wasSelected = selected.includes(column);
    if (column === name ? !wasSelected : wasSelected) {
      next.push(column);
    }
    i += 1;
  }
  return next;
}

function isLegendVisibility(value: string): value is LegendVisibility {
  return value === "auto" || value === "show" || value === "hide";
}

const sectionStyle: React.CSSProperties = { padding: 10, border: "1px solid #eee", borderRadius: 8 };
const captionStyle: React.CSSProperties = { fontSize: 12, opacity: 0.8, marginBottom: 6 };

export default function ParallelPlotControlsPanel(props: {
  state: ControlsState;
  columns: readonly string[];
  onChangeState: (patch: Partial<ControlsState>) => void;
  onExportClick: () => void;
}) {
  const s = props.state;

  return (
    <div style={{ width: 320, display: "flex", flexDirection: "column", gap: 14 }}>
      <h3 style={{ margin: 0 }}>Controls Panel</h3>

      <div style={sectionStyle}>
        <div style={{ fontWeight: 600, marginBottom: 8 }}>Features</div>
        {props.columns.map((column) => (
          <label key={column} style={{ display: "block", marginBottom: 4 }}>
            <input
              type="checkbox"
              checked={s.selected.includes(column)}
              onChange={() => props.onChangeState({ selected: toggleFeature(props.columns, s.selected, column) })}
            />
            {" "}{column}
          </label>
        ))}
      </div>

      <div style={sectionStyle}>
        <div style={{ fontWeight: 600, marginBottom: 8 }}>Lines</div>

        <label style={{ display: "block", marginBottom: 6 }}>
          <input
            type="checkbox"
            checked={s.curve}
            onChange={(e) => props.onChangeState({ curve: e.currentTarget.checked })}
          />
          {" "}Curved lines
        </label>

        <label style={{ display: "block", marginBottom: 6 }}>
          <input
            type="checkbox"
            checked={s.normalize}
            onChange={(e) => props.onChangeState({ normalize: e.currentTarget.checked })}
          />
          {" "}Normalize features
        </label>

        <ControlledSlider
          label="Curve steps"
          min={CURVE_STEPS_MIN}
          max={CURVE_STEPS_MAX}
          step={1}
          value={s.curveSteps}
          onChange={(next) => props.onChangeState({ curveSteps: next })}
        />
      </div>

      <div style={sectionStyle}>
        <div style={{ fontWeight: 600, marginBottom: 8 }}>Color</div>

        <div style={captionStyle}>Color feature</div>
        <select
          value={s.colorFeature}
          onChange={(e) => props.onChangeState({ colorFeature: e.currentTarget.value })}
          style={{ width: "100%", marginBottom: 8 }}
        >
          <option value="">(last displayed)</option>
          {props.columns.map((column) => (
            <option key={column} value={column}>
              {column}
            </option>
          ))}
        </select>

        <div style={captionStyle}>Colormap</div>
        <select
          value={s.colormap}
          onChange={(e) => {
            const raw = e.currentTarget.value;
            if (isColormapName(raw)) {
              props.onChangeState({ colormap: raw });
            }
          }}
          style={{ width: "100%", marginBottom: 8 }}
        >
          {COLORMAP_NAMES.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>

        <div style={captionStyle}>Color legend</div>
        <select
          value={s.showColorLegend}
          onChange={(e) => {
            const raw = e.currentTarget.value;
            if (isLegendVisibility(raw)) {
              props.onChangeState({ showColorLegend: raw });
            }
          }}
          style={{ width: "100%" }}
        >
          {LEGEND_OPTIONS.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      </div>

      <div>
        <div style={captionStyle}>Chart title</div>
        <input
          value={s.title}
          onChange={(e) => props.onChangeState({ title: e.currentTarget.value })}
          style={{ width: "100%" }}
        />
      </div>

      <div>
        <div style={captionStyle}>Export file name</div>
        <input
          value={s.exportFileName}
          onChange={(e) => props.onChangeState({ exportFileName: e.currentTarget.value })}
          style={{ width: "100%" }}
        />
        <button onClick={props.onExportClick} style={{ marginTop: 8 }}>
          Export SVG
        </button>
      </div>
    </div>
  );
}
