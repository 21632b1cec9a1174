import { serve } from "@hono/node-server"
import { loadConfig } from "./config"
import { AppDb, findDuplicateNames } from "./db"
import { createLoggers } from "./logger"
import { createFetchHandler } from "./router"
import type { ServerContext } from "./server-context"
import { GuardrailJudge } from "./services/llm-judge"
import { AiSdkCompletionProvider } from "./services/model-client"
import { PaymentAgent } from "./services/payment-agent"
import { PaymentOrchestrator } from "./services/payment-orchestrator"

const config = loadConfig()
const loggers = createLoggers(config)
const db = await AppDb.open(config.dbPath)

const judge = new GuardrailJudge(
  new AiSdkCompletionProvider(config.model, config.model.judgeModel),
  config.model.timeoutMs,
  loggers.security,
)
const agent = new PaymentAgent(
  new AiSdkCompletionProvider(config.model, config.model.agentModel),
  config.model.timeoutMs,
  loggers.app,
)
const orchestrator = new PaymentOrchestrator({
  store: db,
  judge,
  agent,
  loggers,
  recorder: db,
  scoring: config.scoring,
})

const ctx: ServerContext = {
  config,
  db,
  loggers,
  orchestrator,
}

const vendors = await db.all()
const duplicates = findDuplicateNames(vendors)
if (duplicates.length > 0) {
  loggers.security.warn({ duplicates }, "duplicate vendor names present at start-up")
}

const server = serve(
  {
    fetch: createFetchHandler(ctx),
    hostname: config.host,
    port: config.port,
  },
  (info) => {
    loggers.app.info(
      {
        host: info.address,
        port: info.port,
        vendorCount: vendors.length,
        llmProvider: config.model.provider,
        agentModel: config.model.agentModel,
        judgeModel: config.model.judgeModel,
        guardrailDefault: config.guardrailDefault,
      },
      "vendor-rag-guard started",
    )

    console.log(`vendor-rag-guard listening on http://${info.address}:${info.port}`)
  },
)

function shutdown(): void {
  server.close(() => {
    db.close()
    process.exit(0)
  })
}

process.on("SIGINT", shutdown)
process.on("SIGTERM", shutdown)
