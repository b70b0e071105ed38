import { test, expect, vi, afterEach } from 'vitest'
import { createServer, Socket, type Server } from 'node:net'
import { mkdtemp, rm } from 'node:fs/promises'
import { attach } from 'neovim'
import os from 'node:os'
import path from 'node:path'
import { connect, openSocket } from '../neovim.js'
import logger from '../log.js'

vi.mock('neovim', () => {
  return {
    attach: vi.fn(() => ({ on: vi.fn() })),
  }
})

vi.mock('../log.js', () => {
  return {
    default: {
      debug: vi.fn(),
      error: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      err: vi.fn(),
      level: 'warn',
    }
  }
})

const cleanup: Array<() => Promise<void>> = []

afterEach(async () => {
  while (cleanup.length) {
    await cleanup.pop()?.()
  }
})

async function listen(sockPathOrPort: string | number) {
  const server: Server = createServer((s) => {
    s.on('error', () => {})
  })
  cleanup.push(() => new Promise<void>((res) => server.close(() => res())))
  await new Promise<void>((res) => {
    if (typeof sockPathOrPort === 'string') {
      server.listen(sockPathOrPort, res)
    } else {
      server.listen(sockPathOrPort, '127.0.0.1', res)
    }
  })
  return server
}

const accepted = (server: Server) => new Promise<Socket>((res) => server.once('connection', res))

async function tempSocketPath() {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'nvr-test-'))
  cleanup.push(() => rm(dir, { recursive: true, force: true }))
  return path.join(dir, 'nvim.sock')
}

test('openSocket connects to a unix socket', async () => {
  const sockPath = await tempSocketPath()
  const server = await listen(sockPath)
  const peer = accepted(server)

  const socket = await openSocket(sockPath)
  expect(await peer).toBeDefined()
  socket.destroy()
})

test('openSocket connects to host:port', async () => {
  const server = await listen(0)
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('expected a tcp address')
  }

  const socket = await openSocket(`127.0.0.1:${address.port}`)
  expect(socket.remotePort).toBe(address.port)
  socket.destroy()
})

test('openSocket rejects when nothing listens', async () => {
  const sockPath = await tempSocketPath()
  await expect(openSocket(sockPath)).rejects.toMatchObject({ code: 'ENOENT' })
})

test('connect attaches the client to the socket and disconnect ends it', async () => {
  const sockPath = await tempSocketPath()
  const server = await listen(sockPath)
  const peer = accepted(server)

  const session = await connect(sockPath)
  const options = vi.mocked(attach).mock.calls.at(-1)?.[0]
  expect(options?.options?.logger).toBe(logger)
  expect(options?.writer).toBeInstanceOf(Socket)
  const reader = options?.reader
  if (reader === undefined) {
    throw new Error('expected a reader')
  }

  const remote = await peer
  const received = new Promise<string>((res) => reader.once('data', (chunk) => res(String(chunk))))
  remote.write('hello')
  expect(await received).toBe('hello')

  const ended = new Promise<void>((res) => remote.once('end', res))
  remote.resume()
  session.disconnect()
  await ended
  remote.end()
})
