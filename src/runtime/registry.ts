// Load validation registry
// Stores per-class validations and resolves them down the class hierarchy

import type {
  LoadableClass,
  LoadValidation,
  LoadValidationOptions,
  RegisteredValidation,
} from "../types/loadable";
import { LoadableError, LoadableErrorCodes } from "../utils/errors";

export interface LoadValidationRegistryOptions {
  /**
   * Whether designated root types get their default validation.
   * Read once per root, when its validations are first materialized.
   */
  defaultsEnabled?: () => boolean;

  /**
   * Whether to warn about registrations on types already read
   */
  warnOnLateRegistration?: () => boolean;
}

/**
 * Registry of load validations keyed by class.
 *
 * Only strict subclasses of `base` participate. A participating class whose
 * parent does not participate is a root; the effective validations of any
 * class are its ancestors' (root first) followed by its own, in
 * registration order.
 */
export class LoadValidationRegistry<TBase extends object> {
  private readonly base: LoadableClass<TBase>;
  private readonly options: LoadValidationRegistryOptions;
  private readonly ownValidations = new Map<
    Function,
    RegisteredValidation<TBase>[]
  >();
  private readonly defaults = new Map<Function, RegisteredValidation<TBase>>();
  private readonly resolved = new WeakSet<Function>();

  constructor(
    base: LoadableClass<TBase>,
    options: LoadValidationRegistryOptions = {},
  ) {
    this.base = base;
    this.options = options;
  }

  /**
   * Append a validation to a class's own list.
   *
   * @throws LoadableError (INVALID_ARGUMENT) if the rule is not a function
   * or the class does not extend the registry's base
   */
  register<T extends TBase>(
    type: LoadableClass<T>,
    rule: LoadValidation<T>,
    options: LoadValidationOptions = {},
  ): void {
    this.assertParticipates(type);
    if (typeof rule !== "function") {
      throw new LoadableError(
        `A load validation for ${type.name} must be a function`,
        { code: LoadableErrorCodes.INVALID_ARGUMENT, host: type.name },
      );
    }

    if (this.resolved.has(type)) {
      this.warnLateRegistration(type, options.silent);
    }

    const validations = this.materialize(type);
    const name =
      options.name ?? (rule.name || `${type.name}#${validations.length}`);
    validations.push(this.bind(type, rule, name));
  }

  /**
   * Designate the default validation of a root class.
   *
   * It becomes the first entry of the root's own list when that list is
   * materialized, unless defaults are disabled at that moment.
   */
  seedDefault<T extends TBase>(
    type: LoadableClass<T>,
    rule: LoadValidation<T>,
    options: Pick<LoadValidationOptions, "name"> = {},
  ): void {
    if (!this.isRoot(type)) {
      throw new LoadableError(
        `${type.name} is not a root type; only root types can seed a default load validation`,
        { code: LoadableErrorCodes.INVALID_ARGUMENT, host: type.name },
      );
    }
    if (this.defaults.has(type)) {
      throw new LoadableError(
        `${type.name} already has a default load validation`,
        { code: LoadableErrorCodes.INVALID_ARGUMENT, host: type.name },
      );
    }
    if (this.ownValidations.has(type)) {
      throw new LoadableError(
        `Load validations of ${type.name} were already read or extended; seed the default first`,
        { code: LoadableErrorCodes.INVALID_ARGUMENT, host: type.name },
      );
    }

    this.defaults.set(
      type,
      this.bind(type, rule, options.name ?? (rule.name || "default")),
    );
  }

  /**
   * Inherited validations (root first) followed by the class's own.
   * Resolved on every call, so later registrations are always seen.
   */
  effectiveRules(type: Function): RegisteredValidation<TBase>[] {
    this.resolved.add(type);

    const parent: unknown = Object.getPrototypeOf(type);
    const inherited =
      typeof parent === "function" && this.participates(parent)
        ? this.effectiveRules(parent)
        : [];

    return [...inherited, ...this.materialize(type)];
  }

  /**
   * Validations registered directly on the class
   */
  ownRules(type: Function): RegisteredValidation<TBase>[] {
    return [...this.materialize(type)];
  }

  participates(type: Function): boolean {
    return this.base.isPrototypeOf(type);
  }

  isRoot(type: Function): boolean {
    if (!this.participates(type)) return false;
    const parent: unknown = Object.getPrototypeOf(type);
    return !(typeof parent === "function" && this.participates(parent));
  }

  private materialize(type: Function): RegisteredValidation<TBase>[] {
    let validations = this.ownValidations.get(type);
    if (!validations) {
      const seeded = this.defaults.get(type);
      validations = seeded && this.defaultsEnabled() ? [seeded] : [];
      this.ownValidations.set(type, validations);
    }
    return validations;
  }

  private bind<T extends TBase>(
    type: LoadableClass<T>,
    rule: LoadValidation<T>,
    name: string,
  ): RegisteredValidation<TBase> {
    return {
      name,
      owner: type.name,
      check: (host: TBase) => {
        if (!(host instanceof type)) {
          throw new LoadableError(
            `Load validation "${name}" of ${type.name} cannot run against ${host.constructor.name}`,
            {
              code: LoadableErrorCodes.INVALID_ARGUMENT,
              host: host.constructor.name,
              validation: name,
            },
          );
        }
        return rule.call(host, host);
      },
    };
  }

  private assertParticipates(type: Function): void {
    if (!this.participates(type)) {
      throw new LoadableError(
        `${type.name || "Anonymous class"} must extend ${this.base.name} to register load validations`,
        { code: LoadableErrorCodes.INVALID_ARGUMENT, host: type.name },
      );
    }
  }

  private defaultsEnabled(): boolean {
    return this.options.defaultsEnabled?.() ?? true;
  }

  private warnLateRegistration(type: Function, silent = false): void {
    if (silent || !(this.options.warnOnLateRegistration?.() ?? true)) return;
    if (
      typeof process !== "undefined" &&
      process.env?.NODE_ENV === "production"
    ) {
      return;
    }

    console.warn(
      `⚠️  Load validation added to ${type.name} after its load validations were read.\n` +
        `   Checks that already ran did not include it.\n` +
        `   Register load validations right after the class is defined.`,
    );
  }
}
