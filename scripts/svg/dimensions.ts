import type {
  RegistryIcon,
  RegistryIconSet,
  ResolvedDimensions,
  SvgDimensionAttributes,
} from "../../typings/icon-record.js";
import { IconsmithError } from "../errors.js";
import { logEntry } from "../utils/build-log.js";

export const DEFAULT_ICON_SIZE = 24;

const dimensionUnits = ["px", "pt", "rem", "em", "vh", "vw"];

export type DimensionPolicy =
  | { kind: "registry"; icon: RegistryIcon; iconSet: Omit<RegistryIconSet, "icons" | "notFound"> }
  | { kind: "local"; attributes: SvgDimensionAttributes; source?: string };

export interface ViewBox {
  minX: number;
  minY: number;
  width: number;
  height: number;
}

/**
 * Parses a width/height attribute. Accepts `24` and `24px` style values (px, pt, em, rem, vh, vw) when the number is a
 * positive whole number; percentages, fractions and anything else are treated as absent.
 */
export function parseDimension(value: string): number | undefined {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    const parsed = Number.parseInt(trimmed, 10);
    return parsed > 0 ? parsed : undefined;
  }

  if (trimmed.endsWith("%")) return undefined;

  const unit = dimensionUnits.find((suffix) => trimmed.endsWith(suffix));
  if (!unit) return undefined;

  const numeric = trimmed.slice(0, -unit.length).trim();
  if (!/^[+]?\d+(\.\d+)?$/.test(numeric)) return undefined;

  const parsed = Number(numeric);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Parses `minX minY width height`. Width and height are rounded to the nearest integer.
 */
export function parseViewBox(value: string): ViewBox {
  const fields = value.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 4) {
    throw new IconsmithError(
      "MalformedSource",
      `Invalid viewBox format: expected 4 numbers, got ${fields.length}`,
      value
    );
  }

  const [minX, minY, width, height] = fields.map((field, index) => {
    const parsed = Number(field);
    if (!Number.isFinite(parsed)) {
      const names = ["minX", "minY", "width", "height"];
      throw new IconsmithError("MalformedSource", `Invalid viewBox ${names[index]}: '${field}'`, value);
    }
    return parsed;
  });

  return { minX, minY, width: Math.round(width), height: Math.round(height) };
}

function viewBoxSide(value: string, side: "width" | "height"): number {
  const size = parseViewBox(value)[side];
  if (size <= 0) {
    throw new IconsmithError("MalformedSource", `viewBox ${side} must be positive, got '${value}'`, value);
  }
  return size;
}

function resolveRegistryDimensions(
  icon: RegistryIcon,
  iconSet: Omit<RegistryIconSet, "icons" | "notFound">
): ResolvedDimensions {
  // icon-specific values win over collection defaults, which win over the fixed fallback
  const width = icon.width ?? iconSet.width ?? DEFAULT_ICON_SIZE;
  const height = icon.height ?? iconSet.height ?? DEFAULT_ICON_SIZE;
  const left = icon.left ?? iconSet.left ?? 0;
  const top = icon.top ?? iconSet.top ?? 0;

  return { width, height, viewBox: icon.viewBox ?? `${left} ${top} ${width} ${height}` };
}

function resolveLocalDimensions(attributes: SvgDimensionAttributes, source?: string): ResolvedDimensions {
  const width = attributes.width === undefined ? undefined : parseDimension(attributes.width);
  const height = attributes.height === undefined ? undefined : parseDimension(attributes.height);
  const viewBox = attributes.viewBox;

  if (width !== undefined && height !== undefined) {
    return { width, height, viewBox: viewBox ?? `0 0 ${width} ${height}` };
  }

  if (viewBox !== undefined) {
    return {
      width: width ?? viewBoxSide(viewBox, "width"),
      height: height ?? viewBoxSide(viewBox, "height"),
      viewBox,
    };
  }

  if (width !== undefined) {
    return { width, height: width, viewBox: `0 0 ${width} ${width}` };
  }

  if (height !== undefined) {
    return { width: height, height, viewBox: `0 0 ${height} ${height}` };
  }

  logEntry("parse", "warn", `No dimensions found${source ? ` in ${source}` : ""}, using default 24x24`, { source });
  return {
    width: DEFAULT_ICON_SIZE,
    height: DEFAULT_ICON_SIZE,
    viewBox: `0 0 ${DEFAULT_ICON_SIZE} ${DEFAULT_ICON_SIZE}`,
  };
}

export function resolveDimensions(policy: DimensionPolicy): ResolvedDimensions {
  switch (policy.kind) {
    case "registry":
      return resolveRegistryDimensions(policy.icon, policy.iconSet);
    case "local":
      return resolveLocalDimensions(policy.attributes, policy.source);
  }
}
