/**
 * backend/src/shared/service/application-service.ts
 *
 * WHY:
 * - One business transaction = one service class with ONE public entry point.
 * - `SomeService.call(deps, inputs)` builds a fresh instance and runs it, so call
 *   sites read as a single verb and no instance ever outlives its invocation.
 *
 * RULES:
 * - Dependencies are explicit (constructor injection); no ambient lookups.
 * - Inputs are a named-field object, frozen at construction.
 * - Steps are private methods called in a fixed order from call().
 * - Services do not catch their own errors: failures propagate to the caller
 *   (controllers let the central error handler translate them).
 *
 * HOW TO USE:
 *   class ArchiveThing extends ApplicationService<ArchiveDeps, ArchiveInputs, Thing> {
 *     async call(): Promise<Thing> {
 *       this.authorize();
 *       return this.persist();
 *     }
 *   }
 *
 *   const thing = await ArchiveThing.call(deps, { actorId, thingId });
 */

export abstract class ApplicationService<TDeps, TInputs extends object, TResult> {
  protected readonly deps: TDeps;
  protected readonly inputs: Readonly<TInputs>;

  constructor(deps: TDeps, inputs: TInputs) {
    this.deps = deps;
    this.inputs = Object.freeze({ ...inputs });
  }

  /**
   * Constructs a new instance with the given deps + named inputs and runs it.
   */
  static call<TDeps, TInputs extends object, TResult>(
    this: new (deps: TDeps, inputs: TInputs) => { call(): Promise<TResult> },
    deps: TDeps,
    inputs: TInputs,
  ): Promise<TResult> {
    return new this(deps, inputs).call();
  }

  abstract call(): Promise<TResult>;
}
