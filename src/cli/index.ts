#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import process from 'node:process'
import { green, yellow, dim } from 'colorette'
import { CONFIG_PATH, loadConfig, writeDefaultConfig } from '../server/config/manager.js'
import { main as runServer } from '../server/index.js'

const program = new Command()

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10)
  if (!Number.isInteger(port) || port <= 0 || port >= 65536) {
    throw new InvalidArgumentError('port must be an integer between 1 and 65535')
  }
  return port
}

function maskSecret(secret: string): string {
  if (!secret) return '(not set)'
  if (secret.length <= 8) return '****'
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`
}

async function handleStart(options: { port?: number; host?: string }): Promise<void> {
  const created = writeDefaultConfig()
  if (created) {
    console.log(green(`wrote default config to ${CONFIG_PATH}`))
  }
  const config = loadConfig()
  if (!config.upstream.apiKey) {
    console.log(yellow('NVIDIA_NIM_API_KEY is not set and the config has no upstream.apiKey'))
  }
  await runServer({ port: options.port, host: options.host })
}

function handleInit(): void {
  if (writeDefaultConfig()) {
    console.log(green(`wrote default config to ${CONFIG_PATH}`))
  } else {
    console.log(yellow(`config already exists at ${CONFIG_PATH}`))
  }
}

function handleConfig(): void {
  const config = loadConfig()
  const printable = {
    ...config,
    upstream: { ...config.upstream, apiKey: maskSecret(config.upstream.apiKey) }
  }
  console.log(dim(`# ${CONFIG_PATH} with environment overrides`))
  console.log(JSON.stringify(printable, null, 2))
}

program
  .name('kimigate')
  .description('Messages API gateway for chat-completions models')
  .version('0.1.0')

program
  .command('start')
  .description('run the gateway in the foreground')
  .option('--port <port>', 'port to listen on', parsePort)
  .option('--host <host>', 'interface to bind')
  .action(async (options: { port?: number; host?: string }) => {
    try {
      await handleStart(options)
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err))
      process.exitCode = 1
    }
  })

program
  .command('init')
  .description('write the default config file')
  .action(() => {
    handleInit()
  })

program
  .command('config')
  .description('print the effective configuration')
  .action(() => {
    try {
      handleConfig()
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err))
      process.exitCode = 1
    }
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
