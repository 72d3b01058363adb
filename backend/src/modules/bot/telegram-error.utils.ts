import { getErrorMessage } from '../../common/errors/storefront.errors';

/** Telegram rejects an edit that would leave the message as it is; that is not a failure. */
export function isMessageNotModifiedError(error: unknown): boolean {
  return /message is not modified/i.test(getErrorMessage(error));
}
