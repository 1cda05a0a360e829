export { RadicalInteger, sqrt, toBigInt, type IntegerLike } from "./RadicalInteger";
export { RadicalRational, type RationalLike } from "./RadicalRational";
export {
  basisProducts,
  gcd,
  isSquareFree,
  radicandClosure,
  spanningGenerators,
  squareFreeDecompose,
  squareFreeProduct,
} from "./radicals";
