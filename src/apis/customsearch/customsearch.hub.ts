import { Hub, type THubOptions } from '../../core/hub.ts'
import { CseMethods } from './cse.api.ts'

const DEFAULT_URL = 'https://customsearch.googleapis.com/'

/** Custom Search API v1. Calls carry no scopes, so the hub needs an `apiKey` (or a `key` param). */
export class CustomSearch extends Hub {
  constructor(options: THubOptions) {
    super(options, { baseUrl: DEFAULT_URL, rootUrl: DEFAULT_URL })
  }

  public cse(): CseMethods {
    return new CseMethods(this)
  }
}
