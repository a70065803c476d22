/**
 * Kinds of collision shape understood by the overlap tests.
 */
export enum ShapeKind {
  RECT = "rect",
  CIRCLE = "circle",
  MASK = "mask",
}
