import { createGreenhouseAdapter } from "./greenhouse";
import { createLeverAdapter } from "./lever";
import { createAshbyAdapter } from "./ashby";
import { createSmartRecruitersAdapter } from "./smartrecruiters";
import type { AtsAdapter } from "./base";
import type { SourceConfig } from "../config";
import type { Ats } from "../types";

export type { AtsAdapter, HttpClient } from "./base";
export { createHttpClient, closeProxyAgents } from "./base";

export type AdapterRegistry = Record<Ats, AtsAdapter>;

export function createAdapters(sources: SourceConfig["sources"]): AdapterRegistry {
  return {
    greenhouse: createGreenhouseAdapter(sources.greenhouse),
    lever: createLeverAdapter(sources.lever),
    ashby: createAshbyAdapter(sources.ashby),
    smartrecruiters: createSmartRecruitersAdapter(sources.smartrecruiters),
  };
}
