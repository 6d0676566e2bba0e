import { describe, expect, it } from "vitest";

import { sampleFindings } from "../__tests__/analysis-fixtures.helpers.js";

import { buildChecklistView, renderChecklistHtml, serializeFindings } from "./render.js";

describe("serializeFindings", () => {
  it("writes indented JSON that reads back to the same document", () => {
    const document = sampleFindings();
    const json = serializeFindings(document);

    expect(json.endsWith("}\n")).toBe(true);
    expect(json.split("\n")[1]).toBe('  "schemaVersion": 1,');
    expect(JSON.parse(json)).toEqual(document);
  });
});

describe("buildChecklistView", () => {
  it("formats the score for display", () => {
    const view = buildChecklistView(sampleFindings());

    expect(view.riskPercent).toBe(44);
    expect(view.riskLevel).toBe("Medium");
    expect(view.riskClass).toBe("medium");
    expect(view.breakdown[0]).toEqual({
      factor: "overlap",
      raw: "0.33",
      weight: "0.33",
      contribution: "0.111",
    });
    expect(view.hasWarnings).toBe(false);
  });
});

describe("renderChecklistHtml", () => {
  it("renders the checklist page", async () => {
    const html = await renderChecklistHtml(sampleFindings());

    expect(html).toContain("<h1>Test checklist: C1</h1>");
    expect(html).toContain('<p class="risk-medium"><strong>Risk: 44% (Medium)</strong></p>');
    expect(html).toContain("<tr><td>overlap</td><td>0.33</td><td>0.33</td><td>0.111</td></tr>");
    expect(html).toContain("<li>Overlaps with C2 (shared objects: 1)</li>");
    expect(html).not.toContain("<h2>Warnings</h2>");
  });
});
