/**
 * Canonical payment channels accepted on a charge request
 */
export enum PaymentChannel {
  CARD = 'card',
  BANK_TRANSFER = 'bank_transfer',
  USSD = 'ussd',
  MOBILE_MONEY = 'mobile_money',
  QR_CODE = 'qr_code',
}

export const DEFAULT_CHANNELS: readonly PaymentChannel[] = [
  PaymentChannel.CARD,
  PaymentChannel.BANK_TRANSFER,
  PaymentChannel.USSD,
  PaymentChannel.MOBILE_MONEY,
  PaymentChannel.QR_CODE,
];
