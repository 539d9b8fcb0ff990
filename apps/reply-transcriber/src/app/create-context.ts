import { fileURLToPath } from "node:url"
import { applyOverrides, type DeepPartial } from "../lib/apply-overrides"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Directory the `.env.*` and `secrets/` files are read from. */
  cwd?: string
  configOverrides?: DeepPartial<AppConfig>
  infraOverrides?: DeepPartial<InfraClients>
  coreOverrides?: DeepPartial<CoreServices>
  domainOverrides?: DeepPartial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    options.cwd ?? projectRoot,
  )

  const baseCore = createCoreServices(config)
  const core = applyOverrides(baseCore, options.coreOverrides)

  const baseInfra = await createDefaultInfraClients(config, core)
  const infra = applyOverrides(baseInfra, options.infraOverrides)

  const baseDomains = createDefaultDomainServices(config, infra, core)
  const domains = applyOverrides(baseDomains, options.domainOverrides)

  return {
    config,
    infra,
    services: { core, domains },
    createStartHooks,
    createStopHooks,
  }
}
