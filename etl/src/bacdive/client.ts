import { z } from 'zod'
import type { BacRecord, TraitNode } from '@bactraits/shared'
import { isTraitMap } from '@bactraits/shared'

export class BacDiveError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message)
    this.name = 'BacDiveError'
  }
}

export interface BacDiveClientOptions {
  username: string
  password: string
  apiUrl: string
  tokenUrl: string
  // pause before every API call
  sleepMs?: number
  fetch?: typeof fetch
}

const CLIENT_ID = 'api.bacdive.public'
// /fetch takes at most 100 IDs per call
const FETCH_CHUNK = 100

const tokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
})

const pageSchema = z.object({
  count: z.number().optional(),
  next: z.string().nullable().optional(),
  results: z.unknown(),
})

const searchResultsSchema = z.array(
  z.union([
    z.number().int(),
    z.string().regex(/^\d+$/).transform(Number),
    z.object({ id: z.number().int() }),
  ])
)

const traitNodeSchema: z.ZodType<TraitNode> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(traitNodeSchema),
    z.record(traitNodeSchema),
  ])
)

// /fetch answers with records keyed by BacDive ID; older deployments return a plain list
const fetchResultsSchema = z.union([z.array(traitNodeSchema), z.record(traitNodeSchema)])

// a `next` pointing back at the current page ends paging
const nextPage = (page: { next?: string | null }, current: string): string | null =>
  page.next && page.next !== current ? page.next : null

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Thin client for the BacDive REST API (https://api.bacdive.dsmz.de).
 * Logs in with the password grant and retries a request once after a 401.
 */
export class BacDiveClient {
  private accessToken: string | null = null
  private readonly fetchImpl: typeof fetch
  private readonly sleepMs: number

  constructor(private readonly options: BacDiveClientOptions) {
    this.fetchImpl = options.fetch ?? fetch
    this.sleepMs = options.sleepMs ?? 0
  }

  async login(): Promise<void> {
    const { username, password, tokenUrl } = this.options
    if (!username || !password) {
      throw new BacDiveError('BacDive credentials missing: set BACDIVE_USERNAME and BACDIVE_PASSWORD')
    }

    const response = await this.fetchImpl(tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: CLIENT_ID,
        grant_type: 'password',
        username,
        password,
      }).toString(),
    })

    if (!response.ok) {
      throw new BacDiveError(`BacDive login failed (HTTP ${response.status})`, response.status)
    }

    const parsed = tokenSchema.safeParse(await response.json())
    if (!parsed.success) throw new BacDiveError('BacDive login returned no access token')
    this.accessToken = parsed.data.access_token
  }

  /** BacDive IDs of all strains filed under a species name ("Genus species [subspecies]"). */
  async search(name: string): Promise<number[]> {
    const parts = name.trim().split(/\s+/).filter(Boolean)
    if (parts.length < 2) {
      throw new BacDiveError(`Not a binomial species name: "${name}"`)
    }

    const ids: number[] = []
    let url: string | null = this.url(`/taxon/${parts.slice(0, 3).map(encodeURIComponent).join('/')}`)
    while (url) {
      const response = await this.get(url)
      if (response.status === 404) return ids
      const page = await this.parsePage(response, url)
      const results = searchResultsSchema.safeParse(page.results)
      if (!results.success) throw new BacDiveError(`Malformed search results from ${url}`)
      for (const r of results.data) ids.push(typeof r === 'object' ? r.id : r)
      url = nextPage(page, url)
    }
    return ids
  }

  async fetchRecords(ids: readonly number[]): Promise<BacRecord[]> {
    const records: BacRecord[] = []
    for (let i = 0; i < ids.length; i += FETCH_CHUNK) {
      const chunk = ids.slice(i, i + FETCH_CHUNK)
      let url: string | null = this.url(`/fetch/${chunk.join(';')}`)
      while (url) {
        const response = await this.get(url)
        const page = await this.parsePage(response, url)
        const results = fetchResultsSchema.safeParse(page.results)
        if (!results.success) throw new BacDiveError(`Malformed records from ${url}`)
        const nodes = Array.isArray(results.data) ? results.data : Object.values(results.data)
        records.push(...nodes.filter(isTraitMap))
        url = nextPage(page, url)
      }
    }
    return records
  }

  /** All candidate records for one species; empty when BacDive has none. */
  async query(name: string): Promise<BacRecord[]> {
    const ids = await this.search(name)
    if (!ids.length) return []
    return this.fetchRecords(ids)
  }

  private url(path: string): string {
    return `${this.options.apiUrl.replace(/\/+$/, '')}${path}`
  }

  private async get(url: string): Promise<Response> {
    if (!this.accessToken) await this.login()
    if (this.sleepMs > 0) await sleep(this.sleepMs)

    let response = await this.fetchImpl(url, { headers: this.headers() })
    if (response.status === 401) {
      await this.login()
      response = await this.fetchImpl(url, { headers: this.headers() })
    }
    return response
  }

  private headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      Authorization: `Bearer ${this.accessToken ?? ''}`,
    }
  }

  private async parsePage(response: Response, url: string): Promise<z.infer<typeof pageSchema>> {
    if (!response.ok) {
      throw new BacDiveError(`BacDive request failed (HTTP ${response.status}): ${url}`, response.status)
    }
    const page = pageSchema.safeParse(await response.json())
    if (!page.success) throw new BacDiveError(`Malformed response from ${url}`)
    return page.data
  }
}
