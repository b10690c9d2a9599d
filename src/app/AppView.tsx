// src/app/AppView.tsx

// ------------------------------------------------------------
// AppView: top-level view and composition root
// 1) creates the model (dataset + attributes)
// 2) creates the controller (rebuilds scenes, notifies views)
// 3) mounts the graph view and the controls panel
// 4) keeps the panel's UI state, pushes edits to the controller
//
// A rejected update (unknown feature, too few features, ...) leaves the
// last good plot on screen and shows the reason above it.
// ------------------------------------------------------------

import React from "react";

import { SVG_HEIGHT, SVG_WIDTH } from "../core/layout";
import { isPlotError } from "../core/errors";
import { columnNames, datasetFromRecords, type Dataset } from "../lib/dataset";
import { ParallelPlotModel } from "../MVC/model/ParallelPlotModel";
import { ParallelPlotController } from "../MVC/controller/ParallelPlotController";
import { ParallelPlotGraphView } from "../MVC/view/ParallelPlotGraphView";
import ParallelPlotControlsPanel, {
  controlsToAttributes,
  type ControlsState,
} from "./ParallelPlotControlsPanel";
import demoData from "./demoData.json";

type Props = {
  data?: Dataset;
  title?: string;
};

type State = {
  controls: ControlsState;
  error: string | null;
};

export function describeUpdateError(err: unknown): string {
  if (isPlotError(err)) {
    return err.message;
  }
  if (err instanceof Error) {
    return "Unexpected error: " + err.message;
  }
  return "Unexpected error: " + String(err);
}

export default class AppView extends React.Component<Props, State> {
  // long-lived objects live in fields, not in state
  private readonly model: ParallelPlotModel;
  private readonly controller: ParallelPlotController;
  private readonly columns: string[];

  private graphRef: React.RefObject<ParallelPlotGraphView>;

  constructor(props: Props) {
    super(props);

    // 1) dataset: given, or the bundled demo
    const data = props.data ? props.data : datasetFromRecords(demoData.records);
    const title = props.title !== undefined ? props.title : demoData.title;
    this.columns = columnNames(data);

    // 2) UI state
    const controls: ControlsState = {
      title,
      selected: [...this.columns],
      colorFeature: "",
      colormap: "viridis",
      curve: false,
      curveSteps: 30,
      normalize: false,
      showColorLegend: "auto",
      exportFileName: "parallel-plot",
    };
    this.state = { controls, error: null };

    // 3) model + controller
    this.model = new ParallelPlotModel({ data, attributes: controlsToAttributes(controls) });
    this.controller = new ParallelPlotController({
      model: this.model,
      width: SVG_WIDTH,
      height: SVG_HEIGHT,
    });

    this.graphRef = React.createRef<ParallelPlotGraphView>();

    this.handleControlsChange = this.handleControlsChange.bind(this);
    this.handleExportClick = this.handleExportClick.bind(this);
  }

  // ----------------------------------------------------------
  // handleControlsChange
  // - the export file name is UI only
  // - everything else goes through the controller first; the panel
  //   only moves when the controller accepts the update
  // ----------------------------------------------------------
  private handleControlsChange(patch: Partial<ControlsState>) {
    const next: ControlsState = { ...this.state.controls, ...patch };

    if (Object.keys(patch).length === 1 && patch.exportFileName !== undefined) {
      this.setState({ controls: next });
      return;
    }

    try {
      this.controller.setAttributes(controlsToAttributes(next));
      this.setState({ controls: next, error: null });
    } catch (err) {
      const message = describeUpdateError(err);
      console.warn("[parallel-plot] update rejected:", message);
      this.setState({ error: message });
    }
  }

  private handleExportClick() {
    const graph = this.graphRef.current;
    if (graph) {
      graph.exportSvg(this.state.controls.exportFileName);
    }
  }

  render() {
    return (
      <div style={{ padding: 16 }}>
        <h2>Parallel Coordinates</h2>

        <div style={{ display: "flex", gap: 24, alignItems: "flex-start" }}>
          <ParallelPlotControlsPanel
            state={this.state.controls}
            columns={this.columns}
            onChangeState={this.handleControlsChange}
            onExportClick={this.handleExportClick}
          />

          <div>
            {this.state.error !== null ? (
              <div role="alert" style={{ color: "#b00020", marginBottom: 8 }}>
                {this.state.error}
              </div>
            ) : null}
            <ParallelPlotGraphView ref={this.graphRef} controller={this.controller} />
          </div>
        </div>
      </div>
    );
  }
}
