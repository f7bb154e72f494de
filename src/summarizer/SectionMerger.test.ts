import { describe, expect, it } from "vitest";
import { NO_CONTENT_SENTINEL } from "../utils/config";
import {
  createEmptySection,
  createLeafSection,
  headingOf,
  isEmptySection,
  renderDocument,
  SectionMerger,
} from "./SectionMerger";

describe("SectionMerger", () => {
  const merger = new SectionMerger();

  it("renders children under their own headings in the order supplied", () => {
    const section = merger.merge(
      ["Doc"],
      [
        createLeafSection(["Doc", "Setup"], "Install it."),
        createLeafSection(["Doc", "Usage"], "Run it."),
      ],
    );

    expect(section.heading).toBe("Doc");
    expect(section.body).toBe("## Setup\n\nInstall it.\n\n## Usage\n\nRun it.");
    expect(section.children.map((child) => child.heading)).toEqual(["Setup", "Usage"]);
  });

  it("drops sentinel children when a sibling produced content", () => {
    const section = merger.merge(
      ["Doc"],
      [createEmptySection(["Doc", "Setup"]), createLeafSection(["Doc", "Usage"], "Run it.")],
    );

    expect(section.body).toBe("## Usage\n\nRun it.");
    expect(section.children).toHaveLength(1);
  });

  it("collapses all-sentinel children into a single sentinel", () => {
    const section = merger.merge(
      ["Doc", "Guide"],
      [createEmptySection(["Doc", "Guide", "A"]), createEmptySection(["Doc", "Guide", "B"])],
    );

    expect(section.body).toBe(NO_CONTENT_SENTINEL);
    expect(section.heading).toBe("Guide");
    expect(section.children).toEqual([]);
    expect(isEmptySection(section)).toBe(true);
  });

  it("returns the sentinel when there are no children", () => {
    expect(merger.merge(["Doc"], []).body).toBe(NO_CONTENT_SENTINEL);
  });

  it("nests heading levels with the path length", () => {
    const inner = merger.merge(["Doc", "Guide"], [createLeafSection(["Doc", "Guide", "A"], "a")]);
    const outer = merger.merge(["Doc"], [inner]);

    expect(outer.body).toBe("## Guide\n\n### A\n\na");
  });
});

describe("createLeafSection", () => {
  it("trims the written text", () => {
    expect(createLeafSection(["Doc"], "  text \n").body).toBe("text");
  });

  it("falls back to the sentinel for blank or missing text", () => {
    expect(createLeafSection(["Doc"], "   ").body).toBe(NO_CONTENT_SENTINEL);
    expect(createLeafSection(["Doc"], null).body).toBe(NO_CONTENT_SENTINEL);
    expect(createLeafSection(["Doc"], undefined).body).toBe(NO_CONTENT_SENTINEL);
  });
});

describe("headingOf", () => {
  it("returns the last element of the path", () => {
    expect(headingOf(["Doc", "Guide", "Install"])).toBe("Install");
  });

  it("rejects an empty path", () => {
    expect(() => headingOf([])).toThrow("Path must contain at least the root heading");
  });
});

describe("renderDocument", () => {
  it("renders the root heading at level one followed by the body", () => {
    const section = createLeafSection(["Notes"], "Body text");
    expect(renderDocument(section)).toBe("# Notes\n\nBody text\n");
  });
});
