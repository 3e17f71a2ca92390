// Services
// Environment collaborators supplied by the host

export {
  FixedOffsetTimeZone,
  StaticCastDataProvider,
  SystemCastDataProvider,
  SystemTimeZone,
  snapshotProvider,
} from "./environment";
export type { CastDataProvider, TimeZoneProvider } from "./environment";
export type { DimensionSystem, GeometryCodec, GeometryInfo } from "./geometry";
export { InMemoryLobStore } from "./lob";
export type { LobStore } from "./lob";
export { SimpleResult } from "./result";
export type { ResultColumn, ResultRows } from "./result";
