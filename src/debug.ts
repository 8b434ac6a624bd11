import { Grammar, MatchOutput } from "./grammar";

export interface Logger {
  debug(message: string): void;
}

export class Traced<S, T> implements Grammar<S, T> {
  constructor(
    private readonly label: string,
    private readonly grammar: Grammar<S, T>,
    private readonly logger: Logger
  ) {}
  construct(value: T, rest: S): S {
    const out = this.grammar.construct(value, rest);
    this.logger.debug(`${this.label} constructed`);
    return out;
  }
  match(input: S): MatchOutput<S, T> {
    const result = this.grammar.match(input);
    this.logger.debug(
      `${this.label} ${result.type === "value" ? "matched" : "failed"}`
    );
    return result;
  }
}

/**
 * Wraps a grammar so that every match and construct is reported to
 * `logger`. The wrapped grammar behaves exactly like the original.
 */
export const traced = <S, T>(
  label: string,
  grammar: Grammar<S, T>,
  logger: Logger = console
): Grammar<S, T> => new Traced(label, grammar, logger);
