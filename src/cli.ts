#!/usr/bin/env node

/**
 * Tides MCP Server CLI（stdio）
 *
 * Usage:
 *   node dist/cli.js
 *
 * Env:
 *   TIDES_STORAGE_PATH  存储目录，默认 ./tides_data（此时优先 ~/Documents/tides_data），支持 ~/ 与 ${HOME}
 *   TIDES_LOG_LEVEL     info | warn | error
 *   从 .env 加载（当前工作目录）
 */

// 必须最先执行：getConfig 读取的环境变量可能来自 .env
import 'dotenv/config'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { getConfig } from './config'
import { createLogger, setLogLevel } from './logger'
import { StorageUnavailableError } from './errors'
import { TideStore } from './core/TideStore'
import { TideService } from './services/tideService'
import { createTidesMcpServer } from './mcp'

const log = createLogger('CLI')

async function main(): Promise<void> {
  const cfg = getConfig()
  setLogLevel(cfg.logLevel)
  log.info('🌊 Starting Tides MCP Server...')

  const store = new TideStore(cfg.storagePath)
  log.info('Storage directory:', store.getStorageDir())

  const service = new TideService(store)
  const server = createTidesMcpServer(service, {
    name: cfg.serverName,
    version: cfg.serverVersion
  })

  const transport = new StdioServerTransport()
  await server.connect(transport)
  log.info('Running. Connect via stdio.')
}

main().catch((err) => {
  if (err instanceof StorageUnavailableError) {
    log.error(err.message)
  } else {
    log.error('Fatal:', err)
  }
  process.exit(1)
})
