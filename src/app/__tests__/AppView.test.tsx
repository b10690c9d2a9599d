import { describe, it, expect } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import AppView, { describeUpdateError } from "../AppView";
import { datasetFromColumns } from "../../lib/dataset";
import { PlotError } from "../../core/errors";

describe("AppView", () => {
  it("renders the controls and the plot for the given data", () => {
    const data = datasetFromColumns({ height: [160, 170], weight: [60, 70], age: [20, 30] });
    const html = renderToStaticMarkup(<AppView data={data} title="Survey" />);

    expect(html).toContain("<h2>Parallel Coordinates</h2>");
    expect(html).toContain(">Survey</text>");
    expect(html).toContain('<polyline points="');
    expect(html).not.toContain('role="alert"');
  });

  it("renders the bundled demo data by default", () => {
    const html = renderToStaticMarkup(<AppView />);
    expect(html).toContain(">Body measurements and income</text>");
    expect(html).toContain(">income</text>");
  });
});

describe("describeUpdateError", () => {
  it("shows plot errors as they are", () => {
    expect(describeUpdateError(new PlotError("UnknownFeature", 'Unknown feature "x"', "x"))).toBe(
      'Unknown feature "x"',
    );
  });

  it("marks anything else as unexpected", () => {
    expect(describeUpdateError(new Error("boom"))).toBe("Unexpected error: boom");
    expect(describeUpdateError(42)).toBe("Unexpected error: 42");
  });
});
