import { defineConfig, loadEnv, type Plugin } from 'vite'
import react from '@vitejs/plugin-react'
import { VitePWA } from 'vite-plugin-pwa'
import { readdirSync, statSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import type { IncomingMessage, ServerResponse } from 'http'
import type { VercelRequest, VercelResponse } from '@vercel/node'

const root = path.dirname(fileURLToPath(import.meta.url))
const apiDir = path.join(root, 'api')

type ApiHandler = (req: VercelRequest, res: VercelResponse) => unknown

interface ApiRoute {
  pattern: RegExp
  params: string[]
  file: string
}

function isHandler(value: unknown): value is ApiHandler {
  return typeof value === 'function'
}

/** api/items/[id]/quantity.ts -> /api/items/:id/quantity, the way Vercel routes files */
function collectRoutes(dir: string, prefix = '/api'): ApiRoute[] {
  const routes: ApiRoute[] = []
  for (const entry of readdirSync(dir).sort()) {
    if (entry.startsWith('_')) continue
    const full = path.join(dir, entry)
    if (statSync(full).isDirectory()) {
      routes.push(...collectRoutes(full, `${prefix}/${entry}`))
      continue
    }
    if (!entry.endsWith('.ts')) continue
    const name = entry.slice(0, -3)
    const segments = (name === 'index' ? prefix : `${prefix}/${name}`).split('/').filter(Boolean)
    const params: string[] = []
    const source = segments
      .map((segment) => {
        const dynamic = /^\[(\w+)\]$/.exec(segment)
        if (!dynamic) return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
        params.push(dynamic[1])
        return '([^/]+)'
      })
      .join('/')
    routes.push({ pattern: new RegExp(`^/${source}/?$`), params, file: full })
  }
  // Static segments win over dynamic ones
  return routes.sort((a, b) => a.params.length - b.params.length)
}

function readRawBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = ''
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString()
    })
    req.on('end', () => resolve(body))
    req.on('error', reject)
  })
}

function parseBody(raw: string, contentType: string | undefined): unknown {
  if (!raw) return undefined
  if (contentType?.includes('application/json')) return JSON.parse(raw)
  if (contentType?.includes('application/x-www-form-urlencoded')) {
    return Object.fromEntries(new URLSearchParams(raw))
  }
  return raw
}

function parseCookieHeader(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {}
  for (const pair of (header ?? '').split(';')) {
    const eq = pair.indexOf('=')
    if (eq > 0) cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim()
  }
  return cookies
}

/** Gives node's req/res the helpers a Vercel function expects */
async function toVercel(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  params: Record<string, string>,
): Promise<[VercelRequest, VercelResponse]> {
  const query: Record<string, string | string[]> = { ...params }
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key)
    query[key] = values.length === 1 ? values[0] : values
  }

  const request: VercelRequest = Object.assign(req, {
    query,
    cookies: parseCookieHeader(req.headers.cookie),
    body: parseBody(await readRawBody(req), req.headers['content-type']),
  })

  const response: VercelResponse = Object.assign(res, {
    status(code: number) {
      res.statusCode = code
      return response
    },
    json(body: unknown) {
      if (!res.getHeader('Content-Type')) res.setHeader('Content-Type', 'application/json')
      res.end(JSON.stringify(body))
      return response
    },
    send(body: unknown) {
      if (typeof body === 'object' && body !== null && !Buffer.isBuffer(body)) return response.json(body)
      res.end(typeof body === 'string' || Buffer.isBuffer(body) ? body : String(body ?? ''))
      return response
    },
    redirect(statusOrUrl: string | number, target?: string) {
      const statusCode = typeof statusOrUrl === 'number' ? statusOrUrl : 307
      res.writeHead(statusCode, { Location: typeof statusOrUrl === 'string' ? statusOrUrl : (target ?? '/') })
      res.end()
      return response
    },
  })

  return [request, response]
}

/** Serves the files under api/ from the dev server, the way Vercel does in production */
function apiRoutesPlugin(): Plugin {
  return {
    name: 'stockroom-api-routes',
    configureServer(server) {
      // Load all env vars (including non-VITE_ prefixed) from .env files
      const env = loadEnv('development', root, '')
      for (const [key, value] of Object.entries(env)) {
        process.env[key] ??= value
      }
      const routes = collectRoutes(apiDir)

      server.middlewares.use(async (req, res, next) => {
        const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`)
        if (!url.pathname.startsWith('/api/')) return next()

        for (const route of routes) {
          const match = route.pattern.exec(url.pathname)
          if (!match) continue
          const params = Object.fromEntries(route.params.map((name, i) => [name, decodeURIComponent(match[i + 1])]))
          try {
            const mod = await server.ssrLoadModule(route.file)
            const handler: unknown = mod.default
            if (!isHandler(handler)) throw new Error(`${route.file} has no default export`)
            const [request, response] = await toVercel(req, res, url, params)
            await handler(request, response)
          } catch (err) {
            server.config.logger.error(`[stockroom:dev] ${url.pathname}: ${err instanceof Error ? err.stack : String(err)}`)
            if (!res.headersSent) {
              res.writeHead(500, { 'Content-Type': 'application/json' })
              res.end(JSON.stringify({ status: 'error', message: 'Something went wrong' }))
            }
          }
          return
        }

        res.writeHead(404, { 'Content-Type': 'application/json' })
        res.end(JSON.stringify({ status: 'error', message: 'Not found' }))
      })
    },
  }
}

export default defineConfig({
  plugins: [
    apiRoutesPlugin(),
    react(),
    VitePWA({
      registerType: 'autoUpdate',
      manifest: {
        name: 'Stockroom',
        short_name: 'Stockroom',
        description: 'Household inventory with low-stock reminders.',
        display: 'standalone',
        theme_color: '#37474f',
        background_color: '#fafafa',
        icons: [
          { src: '/icon.svg', sizes: '192x192', type: 'image/svg+xml' },
          { src: '/icon.svg', sizes: '512x512', type: 'image/svg+xml' },
        ],
      },
      workbox: {
        globPatterns: ['**/*.{js,css,html,ico,png,svg,woff2}'],
        navigateFallbackDenylist: [/^\/api\//],
      },
    }),
  ],
  resolve: {
    alias: {
      '@domain': path.resolve(root, 'src/domain'),
      '@application': path.resolve(root, 'src/application'),
      '@infrastructure': path.resolve(root, 'src/infrastructure'),
      '@presentation': path.resolve(root, 'src/presentation'),
    },
  },
})
