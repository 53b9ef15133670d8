/**
 * Tides 配置管理
 * 合并顺序：默认值 ← 环境变量（.env 由 cli 通过 dotenv 预先加载）
 * 存储路径只在启动时读取一次
 */

import fs from 'fs'
import os from 'os'
import path from 'path'

export const DEFAULT_STORAGE_PATH = './tides_data'

export type LogLevel = 'info' | 'warn' | 'error'

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'info' || value === 'warn' || value === 'error'
}

export interface TidesConfig {
  /** 存储目录（绝对路径），每条 tide 一个 JSON 文件 */
  storagePath: string
  /** 日志级别 */
  logLevel: LogLevel
  /** MCP 服务名 */
  serverName: string
  /** MCP 服务版本 */
  serverVersion: string
}

/**
 * 展开 ~ / ${HOME} / $HOME
 */
export function expandStoragePath(raw: string, homeDir: string): string {
  let out = raw
  if (out === '~') {
    out = homeDir
  } else if (out.startsWith('~/')) {
    out = path.join(homeDir, out.slice(2))
  }
  return out.replace(/\$\{HOME\}|\$HOME\b/g, homeDir)
}

/**
 * 默认相对路径时优先使用 ~/Documents/tides_data，创建失败则保留默认值
 */
export function resolveStoragePath(raw: string, homeDir: string): string {
  const expanded = expandStoragePath(raw, homeDir)
  if (expanded !== DEFAULT_STORAGE_PATH) {
    return path.resolve(process.cwd(), expanded)
  }
  const documentsPath = path.join(homeDir, 'Documents', 'tides_data')
  try {
    fs.mkdirSync(documentsPath, { recursive: true })
    return documentsPath
  } catch {
    return path.resolve(process.cwd(), DEFAULT_STORAGE_PATH)
  }
}

let _config: TidesConfig | null = null

/**
 * 获取当前配置（首次调用后缓存）
 */
export function getConfig(): TidesConfig {
  if (_config) return _config

  const env = process.env
  _config = {
    storagePath: resolveStoragePath(
      env.TIDES_STORAGE_PATH?.trim() || DEFAULT_STORAGE_PATH,
      os.homedir()
    ),
    logLevel: isLogLevel(env.TIDES_LOG_LEVEL) ? env.TIDES_LOG_LEVEL : 'info',
    serverName: 'tides',
    serverVersion: '0.1.0'
  }
  return _config
}

/**
 * 重置配置（用于测试）
 */
export function resetConfig(): void {
  _config = null
}
