export const pkg = "@mirrorsync/relevancy";

export { AOIGrid } from "./spatial/grid";
export { SpatialIndex, POSITION_PROPERTIES, isPositionProperty, positionOf } from "./spatial_index";
export { ZoneRegistry, GLOBAL_ZONE_ID } from "./zones";
export type { Zone, ZoneId, ZonePatch, ZoneMember } from "./zones";
export { RelevancySettingsStore } from "./settings";
export { DEFAULT_RELEVANCY_POLICY, DEFAULT_MAX_DISTANCE, makePolicy, isTierDue } from "./policy";
export type { RelevancyPolicy } from "./policy";
export { RelevancyEngine } from "./engine";
export type { ClientDirectory, CustomRelevancy, RelevanceView, RelevancyEngineDeps } from "./engine";
