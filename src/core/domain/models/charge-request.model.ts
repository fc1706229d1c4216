import {
  IsArray,
  IsEmail,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Length,
  Matches,
  Max,
  validateSync,
} from 'class-validator';
import { InvalidChargeRequestError } from '../../errors';
import { toMinorUnits } from '../value-objects/currency-units';

export const MAX_CHARGE_AMOUNT = 999_999_999.99;

/**
 * Plain input accepted by ChargeRequest.create
 */
export interface ChargeRequestInput {
  amount: number;
  currency: string;
  email: string;
  reference?: string;
  callbackUrl?: string;
  idempotencyKey?: string;
  description?: string;
  metadata?: Record<string, unknown>;
  channels?: string[];
  customer?: Record<string, string>;
}

/**
 * Charge request value object
 * Validated once at construction and frozen afterwards
 */
export class ChargeRequest {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  @Max(MAX_CHARGE_AMOUNT)
  readonly amount: number;

  @Matches(/^[A-Z]{3}$/, { message: 'currency must be a 3-letter ISO 4217 code' })
  readonly currency: string;

  @IsEmail()
  readonly email: string;

  @IsOptional()
  @IsString()
  @Length(1, 100)
  readonly reference?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  readonly callbackUrl?: string;

  @IsOptional()
  @IsString()
  @Length(1, 255)
  readonly idempotencyKey?: string;

  @IsOptional()
  @IsString()
  readonly description?: string;

  @IsObject()
  readonly metadata: Record<string, unknown>;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  readonly channels?: string[];

  @IsOptional()
  @IsObject()
  readonly customer?: Record<string, string>;

  private constructor(input: ChargeRequestInput) {
    this.amount = input.amount;
    this.currency = typeof input.currency === 'string' ? input.currency.trim().toUpperCase() : input.currency;
    this.email = input.email;
    this.reference = input.reference;
    this.callbackUrl = input.callbackUrl;
    this.idempotencyKey = input.idempotencyKey;
    this.description = input.description;
    this.metadata = { ...(input.metadata ?? {}) };
    this.channels = input.channels ? [...input.channels] : undefined;
    this.customer = input.customer ? { ...input.customer } : undefined;
  }

  /**
   * Build a validated request. Throws InvalidChargeRequestError listing every violation.
   */
  static create(input: ChargeRequestInput): ChargeRequest {
    const request = new ChargeRequest(input);
    const violations = validateSync(request).flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );

    if (violations.length > 0) {
      throw new InvalidChargeRequestError(violations);
    }

    return Object.freeze(request);
  }

  /**
   * Amount in the smallest currency unit (kobo, cents); zero-decimal currencies stay whole
   */
  amountInMinorUnits(): number {
    return toMinorUnits(this.amount, this.currency);
  }
}
