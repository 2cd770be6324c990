/**
 * Memory capability
 *
 * Actions: save_embedding {content, source?, metadata?},
 * search_similar {query, limit?}
 */

import type { CapabilityOutput, CapabilityProvider, InvokeRequest } from '../types/capability';
import { CapabilityError } from '../types/capability';
import type { MemoryRetriever } from '../types/collaborators';
import {
  optionalPositiveInt,
  optionalString,
  optionalStringMap,
  requireText,
  unknownAction,
} from './args';

export class MemoryProvider implements CapabilityProvider {
  readonly name = 'memory';

  constructor(
    private readonly memory: MemoryRetriever,
    private readonly defaultLimit: number = 5
  ) {}

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    switch (request.action) {
      case 'save_embedding': {
        const content = requireText(request.args, 'content');
        const source = optionalString(request.args, 'source') ?? `step:${request.stepId}`;
        const metadata = optionalStringMap(request.args, 'metadata');
        try {
          const entry = await this.memory.save({ content, source, metadata });
          return { id: entry.id, saved: true };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new CapabilityError('UNAVAILABLE', message, { cause: error });
        }
      }
      case 'search_similar': {
        const query = requireText(request.args, 'query');
        const limit = optionalPositiveInt(request.args, 'limit', this.defaultLimit);
        const matches = await this.memory.search(query, limit);
        return {
          query,
          matches: matches.map(({ entry, score }) => ({
            id: entry.id,
            content: entry.content,
            source: entry.source,
            score,
          })),
        };
      }
      default:
        throw unknownAction(this.name, request.action);
    }
  }
}
