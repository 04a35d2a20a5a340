import { createServices } from '../../test/create-services';

describe('NotificationService', () => {
  it('pushes to socket clients and the Telegram chat', async () => {
    const { notifications, gateway, telegram } = createServices();
    const broadcast = jest.spyOn(gateway, 'broadcastNotification');
    const send = jest.spyOn(telegram, 'sendMessage').mockResolvedValue(undefined);

    await notifications.notify('<b>hello</b>');

    expect(broadcast).toHaveBeenCalledWith('<b>hello</b>');
    expect(send).toHaveBeenCalledWith('<b>hello</b>', undefined);
  });

  it('sends to the given chat instead of the configured one', async () => {
    const { notifications, telegram } = createServices();
    const send = jest.spyOn(telegram, 'sendMessage').mockResolvedValue(undefined);

    await notifications.notify('hello', 42);

    expect(send).toHaveBeenCalledWith('hello', 42);
  });

  it('is silent on Telegram when no bot is configured', async () => {
    const { notifications, telegram } = createServices();

    expect(telegram.enabled).toBe(false);
    await expect(notifications.notify('hello')).resolves.toBeUndefined();
  });
});
