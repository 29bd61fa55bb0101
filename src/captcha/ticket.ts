import { NO_TICKET, type CaptchaTicket } from './types.js';

export function createTicket(providerTag: string, transactionId: string): CaptchaTicket {
  return { providerTag, transactionId };
}

export function isNoTicket(ticket: CaptchaTicket): boolean {
  return ticket.transactionId === NO_TICKET.transactionId;
}

/** `a12345` style string form, "0" for the sentinel. */
export function formatTicket(ticket: CaptchaTicket): string {
  return isNoTicket(ticket) ? NO_TICKET.transactionId : `${ticket.providerTag}${ticket.transactionId}`;
}
