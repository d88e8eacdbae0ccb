export * from "./enums.js";
export * from "./errors.js";
export * from "./schemas/regulations.js";
export * from "./schemas/lot.js";
export * from "./schemas/developmentPotential.js";
export * from "./designation/parseZoneCode.js";
export * from "./regulations/loadConfig.js";
export * from "./regulations/resolve.js";
export * from "./regulations/repository.js";
export * from "./setbacks/calculateSetbacks.js";
export * from "./far/resolveFloorAreaRatio.js";
export * from "./coverage/resolveLotCoverage.js";
export * from "./validators/minimumRequirements.js";
export * from "./validators/units.js";
export * from "./validators/dwellingTypes.js";
export * from "./analysis/analyze.js";
export * from "./analysis/narratives.js";
export * from "./analysis/permittedUses.js";
export * from "./analysis/timeline.js";
export * from "./analysis/cacheKey.js";
