import type { AppConfig } from "./config"
import type { AppDb } from "./db"
import type { Loggers } from "./logger"
import type { PaymentOrchestrator } from "./services/payment-orchestrator"

export interface ServerContext {
  config: AppConfig
  db: AppDb
  loggers: Loggers
  orchestrator: PaymentOrchestrator
}
