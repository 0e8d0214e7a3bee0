import { z } from 'zod'
import type { Hub } from '../../core/hub.ts'
import { defineMethod } from '../../core/method.ts'
import { searchSchema } from './schemas.ts'

/** Query parameters shared by both search methods. */
const searchQuery = z.object({
  c2coff: z.string().optional(),
  cr: z.string().optional(),
  cx: z.string().optional(),
  dateRestrict: z.string().optional(),
  exactTerms: z.string().optional(),
  excludeTerms: z.string().optional(),
  fileType: z.string().optional(),
  filter: z.string().optional(),
  gl: z.string().optional(),
  googlehost: z.string().optional(),
  highRange: z.string().optional(),
  hl: z.string().optional(),
  hq: z.string().optional(),
  imgColorType: z.string().optional(),
  imgDominantColor: z.string().optional(),
  imgSize: z.string().optional(),
  imgType: z.string().optional(),
  linkSite: z.string().optional(),
  lowRange: z.string().optional(),
  lr: z.string().optional(),
  num: z.coerce.number().int().optional(),
  orTerms: z.string().optional(),
  q: z.string().optional(),
  relatedSite: z.string().optional(),
  rights: z.string().optional(),
  safe: z.string().optional(),
  searchType: z.string().optional(),
  siteSearch: z.string().optional(),
  siteSearchFilter: z.string().optional(),
  sort: z.string().optional(),
  start: z.coerce.number().int().min(0).optional(),
})

// Programmable Search declares no OAuth scopes: every call goes out with an API key.
export const CSE_METHODS = {
  list: defineMethod({
    id: 'search.cse.list',
    httpMethod: 'GET',
    path: 'customsearch/v1',
    pathParameters: [],
    query: searchQuery,
    scopes: [],
    response: searchSchema,
  }),

  siterestrictList: defineMethod({
    id: 'search.cse.siterestrict.list',
    httpMethod: 'GET',
    path: 'customsearch/v1/siterestrict',
    pathParameters: [],
    query: searchQuery,
    scopes: [],
    response: searchSchema,
  }),
}

export class CseMethods {
  private readonly hub: Hub

  constructor(hub: Hub) {
    this.hub = hub
  }

  /**
   * Returns metadata about the search performed, metadata about the engine used for the
   * search, and the search results.
   */
  list() {
    return this.hub.call(CSE_METHODS.list, {})
  }

  /** Same as `list`, restricted to a small set of URL patterns. */
  siterestrictList() {
    return this.hub.call(CSE_METHODS.siterestrictList, {})
  }
}
