/**
 * Base Repository Interface
 *
 * The generic data-access contract shared by entity repositories. Business
 * logic works with domain models; repositories hide Drizzle and SQLite.
 */

/**
 * Standard lookup, creation and deletion for an entity keyed by string id.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The data needed to create a new entity
 *
 * @example
 * ```typescript
 * class OpeningRepository implements Repository<OpeningLine, CreateOpeningInput> {
 *   async findById(id: string): Promise<OpeningLine | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T, CreateInput> {
  /**
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * @returns Every entity of this type (may be empty)
   */
  findAll(): Promise<T[]>;

  /**
   * Persists a new entity.
   *
   * @returns The created domain model with generated id and timestamps
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Permanently deletes an entity.
   *
   * @throws Error if the entity with the given id does not exist
   */
  delete(id: string): Promise<void>;
}
