import path from "node:path";

export type SizeTolerances = {
	small: number;
	medium: number;
	large: number;
};

export type CompositionConfig = {
	/** Subject area fraction below which a subject counts as small, default 0.15 */
	smallSubjectArea: number;
	/** Subject area fraction above which a subject counts as large, default 0.35 */
	largeSubjectArea: number;
	/** Minimum edge margin before a subject is "too close", default 0.03 */
	edgeMargin: number;
	headroomExcessive: number;
	cutoffMargin: number;
	portraitHeadroomMin: number;
	portraitHeadroomMax: number;

	thirds: {
		tolerance: SizeTolerances;
		/** weight applied to grid-line alignment against intersection alignment */
		lineWeight: number;
		perfect: number;
		good: number;
	};
	center: {
		tolerance: number;
		/** per-axis offset above which a direction is named */
		directionThreshold: number;
		symmetryWeight: number;
		symmetryBonusThreshold: number;
	};
	symmetry: {
		sampleSize: number;
		balanceThreshold: number;
		perfect: number;
		good: number;
		centeringPerfect: number;
	};

	/** Evaluate every Nth camera frame, default 3 */
	frameInterval: number;
	warmupMs: number;
	budgetMs: number;

	modelsDir: string;
	faceMinConfidence: number;
	analysisMaxDim: number;
	skipFacialRecognition: boolean;
};

export const DEFAULT_CONFIG: Readonly<CompositionConfig> = {
	smallSubjectArea: 0.15,
	largeSubjectArea: 0.35,
	edgeMargin: 0.03,
	headroomExcessive: 0.4,
	cutoffMargin: 0.02,
	portraitHeadroomMin: 0.1,
	portraitHeadroomMax: 0.25,

	thirds: {
		tolerance: { small: 0.12, medium: 0.15, large: 0.18 },
		lineWeight: 0.7,
		perfect: 0.8,
		good: 0.5,
	},
	center: {
		tolerance: 0.12,
		directionThreshold: 0.05,
		symmetryWeight: 0.2,
		symmetryBonusThreshold: 0.8,
	},
	symmetry: {
		sampleSize: 64,
		balanceThreshold: 0.05,
		perfect: 0.8,
		good: 0.6,
		centeringPerfect: 0.7,
	},

	frameInterval: 3,
	warmupMs: 1000,
	budgetMs: 50,

	modelsDir: path.resolve("models"),
	faceMinConfidence: 0.3,
	analysisMaxDim: 640,
	skipFacialRecognition: false,
};

export type ConfigOverrides = Partial<
	Omit<CompositionConfig, "thirds" | "center" | "symmetry">
> & {
	thirds?: Partial<CompositionConfig["thirds"]>;
	center?: Partial<CompositionConfig["center"]>;
	symmetry?: Partial<CompositionConfig["symmetry"]>;
};

export function resolveConfig(cfg: ConfigOverrides = {}): CompositionConfig {
	return {
		...DEFAULT_CONFIG,
		...cfg,
		thirds: { ...DEFAULT_CONFIG.thirds, ...cfg.thirds },
		center: { ...DEFAULT_CONFIG.center, ...cfg.center },
		symmetry: { ...DEFAULT_CONFIG.symmetry, ...cfg.symmetry },
	};
}
