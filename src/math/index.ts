export { U64_MAX, U128_MAX, FixedUint, mulDivRound, divRound, assertInRange } from "./uint.js";
export { TokenAmount, Factor, Wad, Ray, Rate } from "./fixed-point.js";
export { UnixTimestamp } from "./timestamp.js";
export { mintAmount, calculateShare } from "./liquidity.js";
