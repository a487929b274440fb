/**
 * Booking ledger and the capacity bookkeeping it relies on.
 */
export { buildReserveSlotQuery, reserveSlot } from './capacityLedger';
export {
  bookClass,
  listBookingsForUser,
  toBookingResponse,
  type BookClassInput,
  type BookingWithClass,
  type BookingResponse,
} from './bookingLedger';
