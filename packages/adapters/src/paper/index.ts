export { PaperVenueAdapter } from "./paper-venue-adapter";
export type {
  PaperFill,
  PaperMarket,
  PaperOperation,
  PaperOrder,
  PaperOrderStatus,
  PaperVenueOptions,
} from "./paper-venue-adapter";
