import { type ChildProcess, execFile, spawn } from 'node:child_process'
import { closeSync, openSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { createServer } from 'node:net'
import * as path from 'node:path'
import { setTimeout as wait } from 'node:timers/promises'

import { HarnessError } from './errors.js'
import { waitForCdpEndpoint } from './probe.js'
import type { RunLogger } from './run-log.js'

export type LaunchOptions = {
  /** Command to start Electron (e.g., node_modules/.bin/electron). */
  command: string
  /** Arguments passed to the command (e.g., path to main file). */
  args?: string[] | undefined
  /** Working directory for the spawned process. */
  cwd?: string | undefined
  /** Environment variables merged with process.env. */
  env?: NodeJS.ProcessEnv | undefined
  /** Launch Electron without showing a window (passed via E2E_HEADLESS=1). */
  headless?: boolean | undefined
  /** Explicit CDP port; defaults to an available random port. */
  cdpPort?: number | undefined
  /** Timeout for CDP readiness. */
  timeoutMs?: number | undefined
  /** Directory receiving electron.stdout.log, electron.stderr.log and launch.json. */
  runDir: string
  logger?: RunLogger | null | undefined
}

export type LaunchResult = {
  wsUrl: string
  cdpPort: number
  pid: number
  electronPid?: number | undefined
  quit: () => Promise<void>
}

type PsRow = { pid: number; ppid: number; cmd: string }

const parsePs = (stdout: string): PsRow[] =>
  stdout
    .trim()
    .split(/\n+/)
    .map((line) => line.trim().split(/\s+/))
    .map(([pidStr = '', ppidStr = '', ...rest]) => ({
      pid: Number.parseInt(pidStr, 10),
      ppid: Number.parseInt(ppidStr, 10),
      cmd: rest.join(' '),
    }))
    .filter((row) => Number.isFinite(row.pid) && Number.isFinite(row.ppid))

const listChildren = async (pid: number): Promise<PsRow[]> =>
  new Promise((resolve) => {
    execFile('ps', ['-eo', 'pid=', '-o', 'ppid=', '-o', 'comm='], (err, stdout) => {
      if (err || !stdout) return resolve([])
      const rows = parsePs(stdout)
      const children: PsRow[] = []
      const visit = (parent: number) => {
        for (const row of rows) {
          if (row.ppid === parent && !children.some((c) => c.pid === row.pid)) {
            children.push(row)
            visit(row.pid)
          }
        }
      }
      visit(pid)
      resolve(children)
    })
  })

export const findPort = async (preferred?: number): Promise<number> =>
  new Promise((resolve, reject) => {
    const server = createServer()
    server.unref()
    server.on('error', (err: NodeJS.ErrnoException) => {
      server.close()
      if (err.code === 'EADDRINUSE') {
        findPort().then(resolve).catch(reject)
      } else {
        reject(err)
      }
    })
    server.listen(preferred ?? 0, '127.0.0.1', () => {
      const address = server.address()
      server.close(() => {
        resolve(address && typeof address === 'object' ? address.port : (preferred ?? 0))
      })
    })
  })

/** Sends `sig` to `pid`; false when the process (group) does not exist. */
const signal = (pid: number, sig: NodeJS.Signals | 0): boolean => {
  try {
    process.kill(pid, sig)
    return true
  } catch {
    return false
  }
}

const isAlive = (pid: number): boolean => signal(pid, 0)

const pkillChildren = (pid: number, sig: 'TERM' | 'KILL') =>
  new Promise<void>((resolve) => {
    execFile('pkill', [`-${sig}`, '-P', String(pid)], () => resolve())
  })

/**
 * Stops a process and its group: SIGINT, SIGTERM, SIGKILL, then pkill of direct children.
 * Resolves false if the process is still alive afterwards.
 */
export const terminateTree = async (
  pid: number,
  { timeoutMs = 3000, logger }: { timeoutMs?: number; logger?: RunLogger | null } = {},
): Promise<boolean> => {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGKILL']
  for (const sig of signals) {
    signal(-pid, sig)
    signal(pid, sig)
    await wait(sig === 'SIGKILL' ? 250 : 400)
    if (!isAlive(pid)) return true
    logger?.log('shell', 'debug', 'terminate-tree-still-alive', { pid, signal: sig })
  }

  const deadline = Date.now() + timeoutMs
  while (Date.now() < deadline) {
    if (!isAlive(pid)) return true
    await wait(100)
  }

  await pkillChildren(pid, 'TERM')
  await wait(200)
  await pkillChildren(pid, 'KILL')
  await wait(200)
  signal(pid, 'SIGKILL')

  if (!isAlive(pid)) return true
  logger?.log('shell', 'warn', 'terminate-tree-timeout', { pid })
  return false
}

/**
 * Spawns Electron with a remote debugging port and waits until its CDP endpoint answers.
 * The process is terminated again if it never does.
 */
export const launchElectron = async (opts: LaunchOptions): Promise<LaunchResult> => {
  const logger = opts.logger ?? null
  const cdpPort = opts.cdpPort ?? (await findPort())

  const stdoutFd = openSync(path.join(opts.runDir, 'electron.stdout.log'), 'a')
  const stderrFd = openSync(path.join(opts.runDir, 'electron.stderr.log'), 'a')

  const env: NodeJS.ProcessEnv = {
    ...process.env,
    E2E: '1',
    NODE_ENV: 'test',
    ELECTRON_ENABLE_LOGGING: '1',
    E2E_CDP_PORT: String(cdpPort),
    ...opts.env,
  }
  if (opts.headless) env.E2E_HEADLESS = '1'

  let child: ChildProcess
  try {
    child = spawn(opts.command, [...(opts.args ?? []), `--remote-debugging-port=${cdpPort}`], {
      cwd: opts.cwd ?? process.cwd(),
      env,
      stdio: ['ignore', stdoutFd, stderrFd],
      detached: true,
    })
  } finally {
    // The child holds its own copies.
    closeSync(stdoutFd)
    closeSync(stderrFd)
  }
  child.unref()
  logger?.log('shell', 'info', 'electron-spawned', { pid: child.pid, cdpPort })

  let spawnError: Error | null = null
  child.once('error', (err) => {
    spawnError = err
  })

  const resolveElectronPid = async (rootPid: number): Promise<number> => {
    const descendants = await listChildren(rootPid)
    const electronChild = descendants
      .filter((row) => /Electron/i.test(row.cmd))
      .sort((a, b) => b.pid - a.pid)[0]
    return electronChild ? electronChild.pid : rootPid
  }

  let electronPid: number | undefined

  const quit = async () => {
    if (!child.pid) return
    const okRoot = await terminateTree(child.pid, { logger })
    if (!okRoot) {
      throw new HarnessError('E_SPAWN', 'Failed to terminate Electron process', { pid: child.pid })
    }
    if (electronPid && electronPid !== child.pid) {
      await terminateTree(electronPid, { logger })
    }

    // Renderer and GPU helpers can outlive the root.
    const leftover = await listChildren(child.pid)
    if (leftover.length) logger?.log('shell', 'debug', 'leftover-descendants', { leftover })
    for (const proc of leftover) signal(proc.pid, 'SIGKILL')
    logger?.log('shell', 'info', 'electron-terminated', { pid: child.pid })
  }

  try {
    // `error` is emitted asynchronously after a failed spawn.
    await wait(0)
    if (spawnError) {
      throw new HarnessError('E_SPAWN', 'Failed to spawn Electron', { command: opts.command }, {
        cause: spawnError,
      })
    }

    const wsUrl = await waitForCdpEndpoint(cdpPort, opts.timeoutMs ?? 40_000)
    electronPid = child.pid ? await resolveElectronPid(child.pid) : undefined
    await writeFile(
      path.join(opts.runDir, 'launch.json'),
      JSON.stringify({ wsUrl, pid: child.pid, electronPid, cdpPort }, null, 2),
      'utf-8',
    )
    return { wsUrl, pid: child.pid ?? -1, electronPid, cdpPort, quit }
  } catch (error) {
    await quit()
    logger?.log('shell', 'error', 'electron-launch-failed', { pid: child.pid, error })
    throw error
  }
}
