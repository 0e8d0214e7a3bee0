import { z } from 'zod'
import { message } from '../../types/google.ts'

/** Echo of one query: the parameters of the current, previous or next page of results. */
export const searchQuerySchema = message({
  count: z.number().int().optional(),
  cx: z.string().optional(),
  dateRestrict: z.string().optional(),
  exactTerms: z.string().optional(),
  excludeTerms: z.string().optional(),
  fileType: z.string().optional(),
  filter: z.string().optional(),
  gl: z.string().optional(),
  hl: z.string().optional(),
  inputEncoding: z.string().optional(),
  language: z.string().optional(),
  outputEncoding: z.string().optional(),
  safe: z.string().optional(),
  searchTerms: z.string().optional(),
  searchType: z.string().optional(),
  siteSearch: z.string().optional(),
  sort: z.string().optional(),
  startIndex: z.number().int().optional(),
  title: z.string().optional(),
  totalResults: z.string().optional(),
})

export const searchResultImageSchema = message({
  byteSize: z.number().int().optional(),
  contextLink: z.string().optional(),
  height: z.number().int().optional(),
  thumbnailHeight: z.number().int().optional(),
  thumbnailLink: z.string().optional(),
  thumbnailWidth: z.number().int().optional(),
  width: z.number().int().optional(),
})

export const searchResultSchema = message({
  cacheId: z.string().optional(),
  displayLink: z.string().optional(),
  fileFormat: z.string().optional(),
  formattedUrl: z.string().optional(),
  htmlFormattedUrl: z.string().optional(),
  htmlSnippet: z.string().optional(),
  htmlTitle: z.string().optional(),
  image: searchResultImageSchema.optional(),
  kind: z.string().optional(),
  labels: z
    .array(
      message({
        displayName: z.string().optional(),
        label_with_op: z.string().optional(),
        name: z.string().optional(),
      }),
    )
    .optional(),
  link: z.string().optional(),
  mime: z.string().optional(),
  pagemap: z.record(z.unknown()).optional(),
  snippet: z.string().optional(),
  title: z.string().optional(),
})
export type TSearchResult = z.infer<typeof searchResultSchema>

export const promotionSchema = message({
  bodyLines: z
    .array(
      message({
        htmlTitle: z.string().optional(),
        link: z.string().optional(),
        title: z.string().optional(),
        url: z.string().optional(),
      }),
    )
    .optional(),
  displayLink: z.string().optional(),
  htmlTitle: z.string().optional(),
  image: message({
    height: z.number().int().optional(),
    source: z.string().optional(),
    width: z.number().int().optional(),
  }).optional(),
  link: z.string().optional(),
  title: z.string().optional(),
})

/** Response of `cse.list` and `cse.siterestrict.list`. */
export const searchSchema = message({
  context: z.record(z.unknown()).optional(),
  items: z.array(searchResultSchema).optional(),
  kind: z.string().optional(),
  promotions: z.array(promotionSchema).optional(),
  queries: message({
    nextPage: z.array(searchQuerySchema).optional(),
    previousPage: z.array(searchQuerySchema).optional(),
    request: z.array(searchQuerySchema).optional(),
  }).optional(),
  searchInformation: message({
    formattedSearchTime: z.string().optional(),
    formattedTotalResults: z.string().optional(),
    searchTime: z.number().optional(),
    totalResults: z.string().optional(),
  }).optional(),
  spelling: message({
    correctedQuery: z.string().optional(),
    htmlCorrectedQuery: z.string().optional(),
  }).optional(),
  url: message({
    template: z.string().optional(),
    type: z.string().optional(),
  }).optional(),
})
export type TSearch = z.infer<typeof searchSchema>
