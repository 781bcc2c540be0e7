export {
	type Fill,
	type LotSizes,
	type SettleRequest,
	type Venue,
	type VenueOrder,
	OrderSide,
} from "./types.js";
export { nativeBaseQty, nativeQuoteQty, wholeBaseLots } from "./lots.js";
