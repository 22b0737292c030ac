/**
 * Newsbrief — Delivery Module
 */

export {
  WhatsAppDelivery,
  ConsoleDelivery,
  type Delivery,
  type WhatsAppConfig,
  type WhatsAppDeliveryOptions,
} from './whatsapp';

export {
  formatReport,
  formatError,
  formatHealthReport,
  formatLongDate,
  sanitize,
  truncate,
  splitMessage,
  WHATSAPP_MESSAGE_LIMIT,
  type FormatReportOptions,
  type HealthSummary,
} from './formatter';
