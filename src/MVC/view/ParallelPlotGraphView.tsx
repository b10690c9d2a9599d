// src/MVC/view/ParallelPlotGraphView.tsx

// ------------------------------------------------------------
// GraphView: SVG container bound to a controller
// - subscribes in componentDidMount, unsubscribes in componentWillUnmount
// - every scene the controller publishes becomes state -> re-render
// - exportSvg downloads the current scene as a standalone .svg file
// ------------------------------------------------------------

import React from "react";

import type { SceneOutput } from "../../core/drawables";
import type { ParallelPlotController } from "../controller/ParallelPlotController";
import { ParallelPlotSvg } from "./ParallelPlotSvg";
import { renderSvgMarkup } from "./svgMarkup";

type Props = {
  controller: ParallelPlotController;
};

type State = {
  scene: SceneOutput;
};

export class ParallelPlotGraphView extends React.Component<Props, State> {
  // the controller we actually subscribed to (props may change later)
  private subscribedController: ParallelPlotController | null;

  constructor(props: Props) {
    super(props);

    this.state = { scene: props.controller.getScene() };

    this.handleSceneUpdate = this.handleSceneUpdate.bind(this);
    this.subscribedController = null;
  }

  componentDidMount() {
    this.subscribedController = this.props.controller;
    this.subscribedController.subscribe(this.handleSceneUpdate);

    // the controller may have moved on between constructor and mount
    this.setState({ scene: this.props.controller.getScene() });
  }

  componentWillUnmount() {
    if (this.subscribedController) {
      this.subscribedController.unsubscribe(this.handleSceneUpdate);
      this.subscribedController = null;
    }
  }

  private handleSceneUpdate(scene: SceneOutput) {
    this.setState({ scene });
  }

  // ----------------------------------------------------------
  // exportSvg
  // 1) render the current scene as a standalone document
  //    (xml header, xmlns, viewBox)
  // 2) Blob -> object URL -> <a download>
  // ----------------------------------------------------------
  public exportSvg(fileNameRaw: string) {
    let fileName = fileNameRaw.trim();
    if (fileName === "") {
      fileName = "parallel-plot";
    }
    if (!fileName.toLowerCase().endsWith(".svg")) {
      fileName = fileName + ".svg";
    }

    const markup = renderSvgMarkup(this.state.scene);
    const blob = new Blob([markup], { type: "image/svg+xml;charset=utf-8" });
    const url = URL.createObjectURL(blob);

    const a = document.createElement("a");
    a.href = url;
    a.download = fileName;
    document.body.appendChild(a);
    a.click();
    document.body.removeChild(a);

    URL.revokeObjectURL(url);
  }

  render() {
    return (
      <div style={{ border: "1px solid #ddd", display: "inline-block" }}>
        <ParallelPlotSvg scene={this.state.scene} />
      </div>
    );
  }
}
