import { readFile } from "fs/promises";
import { JSDOM } from "jsdom";
import type { IconRecord } from "../../typings/icon-record.js";
import { IconsmithError } from "../errors.js";
import { logEntry } from "../utils/build-log.js";
import { resolveDimensions } from "./dimensions.js";

// One window is enough to parse every file of a run
let domWindow: JSDOM["window"] | undefined;

function getWindow(): JSDOM["window"] {
  domWindow ??= new JSDOM("").window;
  return domWindow;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function isText(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

function hasVisibleText(node: Node): boolean {
  return (node.textContent ?? "").trim() !== "";
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function serializeNode(node: Node): string | undefined {
  if (isText(node)) {
    return hasVisibleText(node) ? escapeXml(node.textContent ?? "") : undefined;
  }

  // comments and processing instructions are dropped
  if (!isElement(node)) return undefined;

  const tagName = node.tagName;
  const attributes = Array.from(node.attributes)
    .map((attribute) => ` ${attribute.name}="${escapeXml(attribute.value)}"`)
    .join("");

  const children = Array.from(node.childNodes);
  const hasContent = children.some((child) => !isText(child) || hasVisibleText(child));
  if (!hasContent) {
    return `<${tagName}${attributes}/>`;
  }

  const inner = children.map(serializeNode).filter((xml): xml is string => xml !== undefined).join("");
  return `<${tagName}${attributes}>${inner}</${tagName}>`;
}

/**
 * Parses SVG markup and returns its root `<svg>` element.
 */
export function parseSvgDocument(source: string, label = "SVG source"): Element {
  const document = new (getWindow().DOMParser)().parseFromString(source, "image/svg+xml");
  const root = document.documentElement;

  if (!root || root.localName === "parsererror") {
    const reason = root?.textContent?.trim();
    throw new IconsmithError(
      "MalformedSource",
      `Failed to parse ${label} as XML${reason ? `: ${reason}` : ""}`,
      label
    );
  }

  if (root.localName !== "svg") {
    throw new IconsmithError(
      "MalformedSource",
      `Not a valid SVG file (root element is <${root.localName}>, not <svg>)`,
      label
    );
  }

  return root;
}

/**
 * Re-serializes the children of the root `<svg>` element, leaving the wrapper out.
 */
export function serializeSvgBody(root: Element, label = "SVG source"): string {
  const body = Array.from(root.childNodes)
    .map(serializeNode)
    .filter((xml): xml is string => xml !== undefined)
    .join("");

  if (body.trim() === "") {
    logEntry("parse", "warn", `${label} has no visible content`, { source: label });
  }

  return body;
}

export function parseSvgSource(source: string, label = "SVG source"): IconRecord {
  const root = parseSvgDocument(source, label);
  const dimensions = resolveDimensions({
    kind: "local",
    attributes: {
      width: root.getAttribute("width") ?? undefined,
      height: root.getAttribute("height") ?? undefined,
      viewBox: root.getAttribute("viewBox") ?? undefined,
    },
    source: label,
  });

  return Object.freeze({ body: serializeSvgBody(root, label), ...dimensions });
}

export async function parseSvgFile(path: string): Promise<IconRecord> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (error) {
    throw new IconsmithError("FilesystemFailure", `Failed to read SVG file: ${path}`, path, { cause: error });
  }
  return parseSvgSource(source, path);
}
