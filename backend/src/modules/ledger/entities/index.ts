import { Payment } from './payment.entity';
import { Subscription } from './subscription.entity';
import { VpnUser } from './vpn-user.entity';

export { Payment, Subscription, VpnUser };
export type { PaymentStatus } from './payment.entity';

export const LEDGER_ENTITIES = [VpnUser, Subscription, Payment];
