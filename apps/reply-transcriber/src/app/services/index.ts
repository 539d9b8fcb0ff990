import {
  createTranscriptionServices,
  type TranscriptionServices,
} from "../../domains/transcription/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  transcription: TranscriptionServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    transcription: createTranscriptionServices(config, core, infra),
  }
}
