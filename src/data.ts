export type Unit = null;
export const unit: Unit = null;

export type Option<T> = { type: "some"; value: T } | { type: "none" };

export const some = <T>(value: T): Option<T> => ({ type: "some", value });
export const none: Option<never> = { type: "none" };

export type Either<L, R> =
  | { type: "left"; value: L }
  | { type: "right"; value: R };

export const left = <L, R = never>(value: L): Either<L, R> => ({
  type: "left",
  value,
});
export const right = <R, L = never>(value: R): Either<L, R> => ({
  type: "right",
  value,
});

export type NonEmpty<T> = [T, ...T[]];
