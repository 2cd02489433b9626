import type { Environment } from './config.js';

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;
const ENV_PATTERN = /\$\{([^:}]+)(?::([^}]*))?\}/g;

export type DataRow = Readonly<Record<string, string>>;

/**
 * Template bindings for one execution.
 *
 * Every builder returns a new context; a derived context never shares its
 * bindings with the one it came from. The process environment is handed in
 * at construction and only ever read.
 */
export class VariableContext {
  private readonly vars: Map<string, string>;
  private readonly env: Environment;

  private constructor(vars: Map<string, string>, env: Environment) {
    this.vars = vars;
    this.env = env;
  }

  /** An empty context that still resolves `${NAME}` against `env`. */
  static empty(env: Environment = {}): VariableContext {
    return new VariableContext(new Map(), env);
  }

  /** Seeds the bindings with every defined environment variable. */
  static fromEnvironment(env: Environment): VariableContext {
    const vars = new Map<string, string>();
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined) {
        vars.set(key, value);
      }
    }
    return new VariableContext(vars, env);
  }

  /**
   * Merges suite variables in declaration order. Each value is substituted
   * against the context built so far, so later variables may refer to
   * earlier ones.
   */
  withSuiteVars(vars?: Readonly<Record<string, string>>): VariableContext {
    const next = this.clone();
    if (vars) {
      for (const [key, value] of Object.entries(vars)) {
        next.vars.set(key, next.substitute(value));
      }
    }
    return next;
  }

  withDataRow(row: DataRow): VariableContext {
    const next = this.clone();
    for (const [key, value] of Object.entries(row)) {
      next.vars.set(key, value);
    }
    return next;
  }

  with(key: string, value: string): VariableContext {
    const next = this.clone();
    next.vars.set(key, value);
    return next;
  }

  clone(): VariableContext {
    return new VariableContext(new Map(this.vars), this.env);
  }

  get(name: string): string | undefined {
    return this.vars.get(name);
  }

  get size(): number {
    return this.vars.size;
  }

  /**
   * Replaces `{{name}}` with its binding (unbound names are left as written),
   * then `${NAME:default}` from the environment, the bindings, or the
   * default, in that order. The `{{}}` pass runs first so its output can
   * still contain `${}` references. Never throws.
   */
  substitute(text: string): string {
    const withVars = text.replace(VARIABLE_PATTERN, (match: string, name: string) => this.vars.get(name) ?? match);

    return withVars.replace(ENV_PATTERN, (_match: string, name: string, fallback: string | undefined) => {
      const fromEnv = Object.hasOwn(this.env, name) ? this.env[name] : undefined;
      return fromEnv ?? this.vars.get(name) ?? fallback ?? '';
    });
  }
}
