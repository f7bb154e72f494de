import { NO_CONTENT_SENTINEL } from "../utils/config";
import type { Path, Section } from "./types";

/**
 * Returns the heading a path ends with.
 */
export function headingOf(path: Path): string {
  const heading = path.at(-1);
  if (heading === undefined) {
    throw new Error("Path must contain at least the root heading");
  }
  return heading;
}

/**
 * Builds a section that carries the no-content sentinel.
 */
export function createEmptySection(path: Path): Section {
  return { path, heading: headingOf(path), body: NO_CONTENT_SENTINEL, children: [] };
}

/**
 * Builds a directly written section, falling back to the sentinel for blank text.
 */
export function createLeafSection(path: Path, text: string | null | undefined): Section {
  const body = text?.trim();
  if (!body) {
    return createEmptySection(path);
  }
  return { path, heading: headingOf(path), body, children: [] };
}

export function isEmptySection(section: Section): boolean {
  return section.body === NO_CONTENT_SENTINEL;
}

/**
 * Renders a section as a Markdown heading, one `#` per path element, followed by its body.
 */
export function renderSection(section: Section): string {
  const marks = "#".repeat(Math.min(section.path.length, 6));
  return `${marks} ${section.heading}\n\n${section.body}`;
}

/**
 * Renders a whole document rooted at the given section.
 */
export function renderDocument(section: Section): string {
  return `${renderSection(section)}\n`;
}

/**
 * Joins child sections into the section of their parent.
 */
export class SectionMerger {
  /**
   * Merges children in the order supplied. Sentinel children are dropped; when
   * nothing else remains the parent itself becomes a sentinel, so sentinels
   * never nest as the tree gets deeper.
   */
  merge(path: Path, children: readonly Section[]): Section {
    const produced = children.filter((child) => !isEmptySection(child));
    if (produced.length === 0) {
      return createEmptySection(path);
    }

    return {
      path,
      heading: headingOf(path),
      body: produced.map(renderSection).join("\n\n"),
      children: produced,
    };
  }
}
