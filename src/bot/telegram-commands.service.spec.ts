import { createServices, givenAToBOpportunity } from '../../test/create-services';
import { HELP_TEXT } from '../notification/message-formatter';
import { TelegramCommandsService } from './telegram-commands.service';

describe('TelegramCommandsService', () => {
  let services: ReturnType<typeof createServices>;
  let commands: TelegramCommandsService;

  beforeEach(() => {
    services = createServices();
    const { telegram, arbitrage, loopManager, config } = services;
    commands = new TelegramCommandsService(telegram, arbitrage, loopManager, config);
  });

  afterEach(() => services.loopManager.stopAll());

  it('ignores messages that are not commands', async () => {
    await expect(commands.dispatch('hello there')).resolves.toBeNull();
    await expect(commands.dispatch('   ')).resolves.toBeNull();
  });

  it('answers /help and /start with the command list', async () => {
    await expect(commands.dispatch('/help')).resolves.toBe(HELP_TEXT);
    await expect(commands.dispatch('/start')).resolves.toBe(
      `🤖 <b>Spot arbitrage bot</b>\n\n${HELP_TEXT}`,
    );
  });

  it('rejects unknown commands', async () => {
    await expect(commands.dispatch('/moon')).resolves.toBe(
      'Unknown command /moon. Send /help for the list.',
    );
    await expect(commands.dispatch('/constructor')).resolves.toBe(
      'Unknown command /constructor. Send /help for the list.',
    );
  });

  it('accepts commands addressed to the bot in group chats', async () => {
    const reply = await commands.dispatch('/STATUS@SpotArbBot');

    expect(reply?.split('\n')[0]).toBe('<b>📊 Prices for BTC/USDT (Simulation)</b>');
  });

  it('reports a price failure as an error', async () => {
    services.venueB.quote = new Error('timeout');

    await expect(commands.dispatch('/real_status')).resolves.toBe(
      '<b>❗ Could not retrieve prices</b>',
    );
  });

  it('runs a simulated arbitrage', async () => {
    givenAToBOpportunity(services.venueA, services.venueB);

    const reply = await commands.dispatch('/arbitrage');

    expect(reply?.split('\n')).toContain(
      '<b>🔴 Opportunity:</b> buy on <b>OKX</b> and sell on <b>KRAKEN</b> (Simulation).',
    );
    expect(services.ledger.size('simulation')).toBe(2);
    expect(services.venueA.orders).toHaveLength(0);
  });

  describe('history', () => {
    it('shows the most recent trades of the requested mode', async () => {
      const { executor } = services;
      await executor.execute('BUY', 'OKX', 100, 'real');
      await executor.execute('SELL', 'KRAKEN', 101, 'real');
      await executor.execute('BUY', 'OKX', 102, 'real');

      const reply = await commands.dispatch('/real_history 2');

      expect(reply?.split('\n')[0]).toBe('<b>📜 Recent trades (Real)</b>');
      expect(reply?.split('\n')).toHaveLength(3);
      expect(reply).toContain('SELL KRAKEN');
      expect(reply).not.toContain('   100.00 ');
      await expect(commands.dispatch('/history')).resolves.toBe(
        '<b>No simulation trades recorded yet.</b>',
      );
    });

    it('rejects a size that is not a positive integer', async () => {
      await expect(commands.dispatch('/history abc')).resolves.toBe(
        '<b>❗ History size must be a positive integer, got "abc"</b>',
      );
      await expect(commands.dispatch('/history 0')).resolves.toBe(
        '<b>❗ History size must be a positive integer, got "0"</b>',
      );
    });
  });

  it('starts and stops the loops', async () => {
    await expect(commands.dispatch('/start_loop')).resolves.toBe(
      '<b>🔄 Simulation arbitrage loop started (every 0.005s).</b>',
    );
    await expect(commands.dispatch('/start_loop')).resolves.toBe(
      '<b>Simulation arbitrage loop is already running.</b>',
    );
    await expect(commands.dispatch('/stop_real_loop')).resolves.toBe(
      '<b>No real arbitrage loop is running.</b>',
    );
    await expect(commands.dispatch('/stop_loop')).resolves.toBe(
      '<b>⏹ Simulation arbitrage loop stopped.</b>',
    );
  });

  it('starts loops that notify the chat that asked for them', async () => {
    const start = jest.spyOn(services.loopManager, 'start');

    await commands.handleMessage(42, '/start_real_loop');

    expect(start).toHaveBeenCalledWith('real', 42);
  });

  it('replies to the chat the command came from', async () => {
    const send = jest.spyOn(services.telegram, 'sendMessage').mockResolvedValue(undefined);

    await commands.handleMessage(42, '/help');
    await commands.handleMessage(42, 'just chatting');

    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(HELP_TEXT, 42);
  });

  it('does not poll for commands without a bot token', async () => {
    const listen = jest.spyOn(services.telegram, 'listen');

    await commands.onApplicationBootstrap();

    expect(listen).not.toHaveBeenCalled();
  });
});
