import * as Either from "effect/Either"

export const rightOf = <A, E>(result: Either.Either<A, E>): A => {
  if (Either.isLeft(result)) {
    throw new Error(`expected Right, got ${JSON.stringify(result.left)}`)
  }
  return result.right
}

export const leftOf = <A, E>(result: Either.Either<A, E>): E => {
  if (Either.isRight(result)) {
    throw new Error(`expected Left, got ${JSON.stringify(result.right)}`)
  }
  return result.left
}
