import { InvalidSelectionError, UnroutableActionError } from '../../../common/errors/storefront.errors';
import { createStorefrontTestbed, type StorefrontTestbed } from '../../../testing/storefront-testing-module';
import { t } from '../i18n/localizer';
import { NavigationService, parseReferral, type Turn } from './navigation.service';
import type { Screen, Transition } from './screens';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-05-10T08:30:00.000Z');

function turn(userId: string, extra: Partial<Turn> = {}): Turn {
  return { userId, displayName: 'Ann', username: 'ann', botUsername: 'test_bot', ...extra };
}

function actionsOf(transition: Transition): string[][] {
  if (transition.kind !== 'screen') throw new Error(`expected a screen, got ${transition.kind}`);
  return transition.actions.map((row) => row.map((b) => b.action));
}

function asScreen(transition: Transition): Screen {
  if (transition.kind !== 'screen') throw new Error(`expected a screen, got ${transition.kind}`);
  return transition;
}

describe('NavigationService', () => {
  let testbed: StorefrontTestbed;
  let navigation: NavigationService;

  beforeEach(async () => {
    testbed = await createStorefrontTestbed();
    navigation = testbed.module.get(NavigationService);
  });

  afterEach(async () => {
    await testbed.close();
  });

  describe('parseReferral', () => {
    it('accepts numeric ref payloads from someone else', () => {
      expect(parseReferral('ref77', '100')).toEqual({ referrerId: '77' });
      expect(parseReferral('refabc', '100')).toBeNull();
      expect(parseReferral('ref100', '100')).toBeNull();
      expect(parseReferral(undefined, '100')).toBeNull();
    });
  });

  describe('start', () => {
    it('asks a new identity for a language and keeps the referral pending', async () => {
      const { screen, pending } = await navigation.start(turn('100'), 'ref77', NOW);

      expect(screen.id).toBe('LanguagePick');
      expect(screen.actions).toEqual([
        [{ text: '🇬🇧 English', action: 'lang:en' }],
        [{ text: '🇷🇺 Русский', action: 'lang:ru' }],
        [{ text: '🇮🇳 हिंदी', action: 'lang:hi' }],
        [{ text: '🇸🇦 العربية', action: 'lang:ar' }],
      ]);
      expect(pending).toEqual({ referrerId: '77' });
      await expect(testbed.ledger.getUser('100')).resolves.toBeNull();
    });

    it('greets a known identity with its status', async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);

      const { screen, pending } = await navigation.start(turn('100'), 'ref77', NOW);

      expect(pending).toBeNull();
      expect(screen.id).toBe('MainMenu');
      expect(screen.text).toBe(t('en', 'welcome_back', { name: 'Ann', status: '❌ No active subscription' }));
    });
  });

  describe('registration', () => {
    it('creates the identity with the pending referrer and advertises the longer trial', async () => {
      const screen = asScreen(await navigation.handle(turn('100', { pending: { referrerId: '77' } }), 'lang:ru', NOW));

      expect(screen.id).toBe('MainMenu');
      expect(screen.text).toContain('Получите 7 дней БЕСПЛАТНО вместо 3!');
      expect(actionsOf(screen)).toEqual([['trial'], ['plans'], ['about', 'support'], ['change_lang']]);
      await expect(testbed.ledger.getUser('100')).resolves.toMatchObject({ lang: 'ru', referrerId: '77', name: 'Ann' });
    });

    it('shows the language picker for any other token from an unknown identity', async () => {
      const screen = asScreen(await navigation.handle(turn('100'), 'plans', NOW));

      expect(screen.id).toBe('LanguagePick');
      await expect(testbed.ledger.getUser('100')).resolves.toBeNull();
    });

    it('switches the language of a known identity', async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);

      const screen = asScreen(await navigation.handle(turn('100'), 'lang:ar', NOW));

      expect(screen.id).toBe('MainMenu');
      await expect(testbed.ledger.getUser('100')).resolves.toMatchObject({ lang: 'ar' });
    });
  });

  describe('trial', () => {
    beforeEach(async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);
    });

    it('grants once, then reports the trial as used', async () => {
      const first = asScreen(await navigation.handle(turn('100'), 'trial', NOW));
      expect(first.id).toBe('TrialResult');
      expect(first.text).toContain('✅ Duration: <b>3 days</b>');
      expect(first.text).toContain('✅ Expires: <code>2026-05-13 08:30</code>');
      expect(first.text).toContain('<code>vless://trial-100@demo.server:443</code>');
      expect(actionsOf(first)).toEqual([['plans'], ['menu']]);

      const second = asScreen(await navigation.handle(turn('100'), 'trial', NOW));
      expect(second.text).toBe(t('en', 'trial_used'));
    });

    it('switches the main menu to the post-trial layout', async () => {
      await navigation.handle(turn('100'), 'trial', NOW);

      const menu = await navigation.handle(turn('100'), 'menu', NOW);

      expect(actionsOf(menu)).toEqual([['plans'], ['account'], ['referrals', 'promo'], ['help', 'support'], ['change_lang']]);
      expect(asScreen(menu).text).toContain('✅ Active (3 days left)');
    });
  });

  describe('purchase flow', () => {
    beforeEach(async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);
    });

    it('walks from plans to payment methods', async () => {
      expect(actionsOf(await navigation.handle(turn('100'), 'plans', NOW))).toEqual([
        ['plan:0'],
        ['plan:1'],
        ['plan:2'],
        ['menu'],
      ]);

      const durations = asScreen(await navigation.handle(turn('100'), 'plan:1', NOW));
      expect(actionsOf(durations)).toEqual([['dur:1:30'], ['dur:1:60'], ['dur:1:180'], ['dur:1:365'], ['plans']]);
      expect(durations.actions[3][0].text).toBe('⏱ 1 year - $90');
      expect(durations.text).toContain('• <b>1 year</b>: $90 ($7.40/month)');

      const methods = asScreen(await navigation.handle(turn('100'), 'dur:1:60', NOW));
      expect(methods.id).toBe('PaymentMethodList');
      expect(methods.text).toContain('💰 Total: <b>$18</b>');
      expect(actionsOf(methods)).toEqual([['pay:stars:1:60'], ['pay:card:1:60'], ['pay:crypto:1:60'], ['plan:1']]);
    });

    it('completes a demo payment at once', async () => {
      const result = asScreen(await navigation.handle(turn('100'), 'pay:card:1:60', NOW));

      expect(result.id).toBe('PaymentResult');
      expect(result.text).toContain('✅ Expires: <code>2026-07-09</code>');
      expect(actionsOf(result)).toEqual([['account'], ['plans'], ['referrals'], ['menu']]);
      const user = await testbed.ledger.getUser('100');
      expect(user?.expiresAt).toEqual(new Date(NOW.getTime() + 60 * DAY));
      expect(user?.totalPaid).toBe(18);
    });

    it('turns the Stars method into an invoice request', async () => {
      const transition = await navigation.handle(turn('100'), 'pay:stars:0:30', NOW);

      expect(transition).toMatchObject({
        kind: 'invoice',
        id: 'PendingInvoice',
        title: 'Basic Plan - 30 days',
        currency: 'XTR',
        prices: [{ label: 'Basic Plan - 30 days', amount: 500 }],
      });
      await expect(testbed.ledger.listSubscriptions('100')).resolves.toEqual([]);
    });

    it('rejects a plan index outside the catalog without changing anything', async () => {
      await expect(navigation.handle(turn('100'), 'plan:9', NOW)).rejects.toBeInstanceOf(InvalidSelectionError);
      await expect(navigation.handle(turn('100'), 'dur:0:45', NOW)).rejects.toBeInstanceOf(InvalidSelectionError);
      await expect(navigation.handle(turn('100'), 'pay:card:7:30', NOW)).rejects.toBeInstanceOf(InvalidSelectionError);
      await expect(testbed.ledger.listSubscriptions('100')).resolves.toEqual([]);
    });

    it('rejects tokens it cannot route', async () => {
      await expect(navigation.handle(turn('100'), 'back_main', NOW)).rejects.toBeInstanceOf(UnroutableActionError);
    });
  });

  describe('account and referrals', () => {
    it('shows totals and the referral link', async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);
      await navigation.handle(turn('200', { displayName: 'Bob', pending: { referrerId: '100' } }), 'lang:en', NOW);
      await navigation.handle(turn('100'), 'pay:crypto:0:30', NOW);

      const account = asScreen(await navigation.handle(turn('100'), 'account', NOW));
      expect(account.text).toContain('💰 <b>Total spent:</b> $5');
      expect(account.text).toContain('👥 <b>Referrals:</b> 1');
      expect(account.text).toContain('✅ Active (30 days left)');

      const referral = asScreen(await navigation.handle(turn('100'), 'referrals', NOW));
      expect(referral.text).toContain('<code>https://t.me/test_bot?start=ref100</code>');
      expect(referral.text).toContain('👥 <b>Invited:</b> 1');
    });
  });

  describe('operators and blocked users', () => {
    it('offers the admin panel only to operators', async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);
      const adminMenu = await navigation.handle(turn('900'), 'lang:en', NOW);

      expect(actionsOf(adminMenu)).toContainEqual(['admin']);
      await expect(navigation.handle(turn('100'), 'admin', NOW)).rejects.toBeInstanceOf(UnroutableActionError);

      const panel = asScreen(await navigation.handle(turn('900'), 'admin', NOW));
      expect(panel.id).toBe('AdminView');
      expect(panel.text).toContain('👥 Users: <b>2</b>');
      expect(panel.text).toContain('💰 Revenue: <b>$0.00</b>');
    });

    it('answers a blocked identity with the blocked notice only', async () => {
      await navigation.handle(turn('100'), 'lang:en', NOW);
      await testbed.ledger.updateUser('100', () => ({ blocked: true }));

      const screen = asScreen(await navigation.handle(turn('100'), 'trial', NOW));

      expect(screen.id).toBe('BlockedNotice');
      expect(screen.text).toBe('🚫 Your account is blocked. Contact support: @TestSupport');
      await expect(testbed.ledger.getUser('100')).resolves.toMatchObject({ trialUsed: false });
    });
  });

  it('renders the info screens', async () => {
    await navigation.handle(turn('100'), 'lang:en', NOW);

    const promo = asScreen(await navigation.handle(turn('100'), 'promo', NOW));
    const support = asScreen(await navigation.handle(turn('100'), 'support', NOW));

    expect(promo.text).toBe(t('en', 'promo_text'));
    expect(support.text).toContain('Write to us: @TestSupport');
    expect(actionsOf(support)).toEqual([['menu']]);
  });
});
