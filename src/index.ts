/**
 * Weather agent server entry point
 *
 * Wires config → weather provider → generative source → memory store → HTTP.
 * Persistence is PostgreSQL when DATABASE_URL is set, in-process otherwise.
 */

import { config } from './config.js'
import { closeDatabase, initDatabase, runMigrations } from './db.js'
import { createGenerativeSource } from './llm/weather-llm.js'
import { InMemoryMemoryStore } from './memory/in-memory-store.js'
import { PgMemoryStore } from './memory/pg-store.js'
import type { MemoryStore } from './memory/store.js'
import { loadPersonaCatalog } from './persona/catalog.js'
import { buildServer } from './server.js'
import { fetchWeather, type WeatherFetcher } from './weather/fetcher.js'
import { OpenWeatherProvider } from './weather/openweather.js'

const provider = config.openWeatherApiKey ? new OpenWeatherProvider(config.openWeatherApiKey) : null
if (!provider) console.warn('[weather] OPENWEATHERMAP_API_KEY not set; every lookup will be service_unavailable')

const weatherFetcher: WeatherFetcher = query => fetchWeather(query, { provider })

let store: MemoryStore
if (config.databaseUrl) {
  initDatabase(config.databaseUrl)
  await runMigrations()
  store = new PgMemoryStore()
} else {
  console.warn('[memory-store] DATABASE_URL not set; using in-process memory')
  store = new InMemoryMemoryStore()
}

const generative = createGenerativeSource(config.groqApiKey, config.groqModel, weatherFetcher)
if (!generative) console.warn('[weather-llm] GROQ_API_KEY not set; answers are synthesized deterministically')

const server = await buildServer({
  store,
  storeKind: config.databaseUrl ? 'postgres' : 'memory',
  fetchWeather: weatherFetcher,
  generative,
  personas: loadPersonaCatalog(),
  defaultMaxSteps: config.agentMaxSteps,
  traceLog: config.traceLog,
})

const shutdown = async () => {
  await server.close()
  await closeDatabase()
  process.exit(0)
}

process.on('SIGTERM', () => { void shutdown() })
process.on('SIGINT', () => { void shutdown() })

try {
  await server.listen({ port: config.port, host: config.host })
  server.log.info(`Weather agent ready on port ${config.port} | generative: ${generative ? 'groq' : 'off'}`)
} catch (err) {
  server.log.error(err)
  await closeDatabase()
  process.exit(1)
}
