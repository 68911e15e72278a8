/**
 * Renderer-agnostic overlay descriptors. All positions are in frame pixels.
 */
import { STATUS_COLORS } from "./feedback";
import type {
	CompositionContext,
	CompositionResult,
	CompositionType,
	Size,
} from "./types";

export type Point = { x: number; y: number };
export type Line = { from: Point; to: Point };
export type Rect = { x: number; y: number; width: number; height: number };

export type OverlayStyle = {
	color: string;
	opacity: number;
	strokeWidth: number;
};

export type GridOverlay = {
	type: "grid";
	lines: Line[];
	style: OverlayStyle;
};

export type CrosshairOverlay = {
	type: "crosshair";
	center: Point;
	/** half-length of each arm, in pixels */
	size: number;
	style: OverlayStyle;
};

export type SymmetryLineOverlay = {
	type: "symmetry-line";
	x: number;
	style: OverlayStyle;
};

export type SafetyZoneOverlay = {
	type: "safety-zone";
	rect: Rect;
	severity: "warning" | "critical";
	style: OverlayStyle;
};

export type OverlayElement =
	| GridOverlay
	| CrosshairOverlay
	| SymmetryLineOverlay
	| SafetyZoneOverlay;

const GUIDE_COLOR = "#ffffff";
const CROSSHAIR_SIZE = 24;
const SAFE_INSET = 0.05;

export function gridOverlay(frame: Size, color = GUIDE_COLOR): GridOverlay {
	const { width, height } = frame;
	const xs = [width / 3, (width * 2) / 3];
	const ys = [height / 3, (height * 2) / 3];
	return {
		type: "grid",
		lines: [
			...xs.map((x) => ({ from: { x, y: 0 }, to: { x, y: height } })),
			...ys.map((y) => ({ from: { x: 0, y }, to: { x: width, y } })),
		],
		style: { color, opacity: 0.6, strokeWidth: 1 },
	};
}

export function crosshairOverlay(frame: Size, color = GUIDE_COLOR): CrosshairOverlay {
	return {
		type: "crosshair",
		center: { x: frame.width / 2, y: frame.height / 2 },
		size: CROSSHAIR_SIZE,
		style: { color, opacity: 0.8, strokeWidth: 1.5 },
	};
}

export function symmetryLineOverlay(frame: Size, color = GUIDE_COLOR): SymmetryLineOverlay {
	return {
		type: "symmetry-line",
		x: frame.width / 2,
		style: { color, opacity: 0.4, strokeWidth: 1 },
	};
}

export function safetyZoneOverlay(
	frame: Size,
	context: CompositionContext,
): SafetyZoneOverlay {
	const margin = frame.width * SAFE_INSET;
	const critical = context.edgeProximity.dangerousEdges.length > 1;
	return {
		type: "safety-zone",
		rect: {
			x: margin,
			y: margin,
			width: frame.width - margin * 2,
			height: frame.height - margin * 2,
		},
		severity: critical ? "critical" : "warning",
		style: {
			color: critical ? "#d00000" : "#ffb703",
			opacity: 0.5,
			strokeWidth: 2,
		},
	};
}

/** Static guides for a rule, shown even when no subject was found */
export function basicOverlays(type: CompositionType, frame: Size): OverlayElement[] {
	switch (type) {
		case "rule_of_thirds":
			return [gridOverlay(frame)];
		case "center_framing":
			return [crosshairOverlay(frame)];
		case "symmetry":
			return [crosshairOverlay(frame), symmetryLineOverlay(frame)];
	}
}

/**
 * Maps a scoring result to overlays. Pure: the same inputs always produce an
 * equal list, and nothing passed in is modified.
 */
export function generateOverlays(
	result: CompositionResult,
	context: CompositionContext,
	frame: Size,
): OverlayElement[] {
	const color = STATUS_COLORS[result.status];
	const overlays: OverlayElement[] = [];

	switch (result.compositionType) {
		case "rule_of_thirds":
			overlays.push(gridOverlay(frame, color));
			break;
		case "center_framing":
			overlays.push(crosshairOverlay(frame, color));
			break;
		case "symmetry":
			overlays.push(crosshairOverlay(frame), symmetryLineOverlay(frame, color));
			break;
	}

	if (context.edgeProximity.tooClose) {
		overlays.push(safetyZoneOverlay(frame, context));
	}
	return overlays;
}
