import { OutboundMessage } from '../notifications/notifier';

export function buildUnreadReminderEmail(
  to: string,
  displayName: string,
  unreadCount: number,
  webAppUrl: string
): OutboundMessage {
  const noun = unreadCount === 1 ? 'message' : 'messages';
  const inboxUrl = `${webAppUrl}/messages`;
  return {
    to,
    subject: `You have ${unreadCount} unread ${noun} on Courtside`,
    text:
      `Hi ${displayName},\n\n` +
      `You have ${unreadCount} unread ${noun} waiting.\n` +
      `Open your inbox: ${inboxUrl}\n\n` +
      'You can turn these reminders off in your settings.',
    html:
      `<p>Hi ${escapeHtml(displayName)},</p>` +
      `<p>You have <strong>${unreadCount}</strong> unread ${noun} waiting.</p>` +
      `<p><a href="${inboxUrl}">Open your inbox</a></p>` +
      '<p style="font-size:12px;">You can turn these reminders off in your settings.</p>',
  };
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
