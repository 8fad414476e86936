import { SettingsV1 } from "./v1/index.js";

export * from "./v1/index.js";

export const Settings = SettingsV1;
export type Settings = SettingsV1;
