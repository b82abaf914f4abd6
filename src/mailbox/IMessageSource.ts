import { RawMessageHeaders } from '../types/index.js';

/**
 * Interface for collaborators that supply message headers in mailbox order
 */
export interface IMessageSource {
  /**
   * Human-readable description of the source, used in logs and errors
   */
  describe(): string;

  /**
   * Checks that the source can be read
   * @throws SourceUnavailableError if it cannot
   */
  open(): void;

  /**
   * Yields the From and Date header strings of every message.
   * Any handle acquired while iterating is released when iteration ends,
   * including when the consumer stops early or throws.
   */
  messages(): Iterable<RawMessageHeaders>;
}
