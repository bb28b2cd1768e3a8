export interface NotificationContent {
  title: string;
  message: string;
}

export const NotificationType = {
  ORDER_PLACED: {
    title: 'Order Placed',
    message: 'New order placed successfully:\n{order_details}',
  },
  ORDER_FAILED: {
    title: 'Order Failed',
    message: 'Failed to place order:\n{error_details}',
  },
  ORDER_COMPLETED: {
    title: 'Order Completed',
    message: 'Order filled:\n{order_details}',
  },
  ERROR_OCCURRED: {
    title: 'Error Occurred',
    message: 'An error occurred in the trading bot:\n{error_details}.',
  },
  TAKE_PROFIT_TRIGGERED: {
    title: 'Take Profit Triggered',
    message: 'Take profit triggered with order details:\n{order_details}',
  },
  STOP_LOSS_TRIGGERED: {
    title: 'Stop Loss Triggered',
    message: 'Stop loss triggered with order details:\n{order_details}',
  },
  HEALTH_CHECK_ALERT: {
    title: 'Health Check Alert',
    message: 'Health check reported a problem:\n{alert_details}',
  },
} as const satisfies Record<string, NotificationContent>;

export type NotificationKind = keyof typeof NotificationType;

export type NotificationFields = Record<string, string | number | undefined>;

const PLACEHOLDER = /\{(\w+)\}/g;

export function templatePlaceholders(template: string): string[] {
  return [...new Set(Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]))];
}

export interface RenderedNotification {
  title: string;
  message: string;
  missing: string[];
}

/** Fills `{name}` placeholders; absent fields render as `N/A` and are reported in `missing`. */
export function renderNotification(kind: NotificationKind, fields: NotificationFields = {}): RenderedNotification {
  const content: NotificationContent = NotificationType[kind];
  const missing = templatePlaceholders(content.message).filter((key) => fields[key] === undefined);
  const message = content.message.replace(PLACEHOLDER, (_match, key: string) => {
    const value = fields[key];
    return value === undefined ? 'N/A' : String(value);
  });
  return { title: content.title, message, missing };
}
