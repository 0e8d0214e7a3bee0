import { CSE_METHODS } from '../../apis/customsearch/cse.api.ts'
import { CustomSearch } from '../../apis/customsearch/customsearch.hub.ts'
import { cliMethods } from '../methods.ts'
import type { TCliDefinition } from '../types.ts'

export const customSearchCli: TCliDefinition = {
  name: 'customsearch1',
  description: 'Searches over a website or collection of websites',
  resources: [{ name: 'cse', methods: cliMethods(CSE_METHODS) }],
  createHub: (options) => new CustomSearch(options),
}
