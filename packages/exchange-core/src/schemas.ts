import { z } from 'zod';
import { SHARE_CATEGORIES, TRADE_ACTIONS } from './config.js';
import { InvalidArgumentError } from './errors.js';

// ============================================================
// Input Schemas
// ============================================================

/**
 * 양의 유한 가격
 */
export const PriceSchema = z.number().finite().positive();

/**
 * 종목 생성 파라미터
 */
export const ShareParamsSchema = z
  .object({
    symbol: z
      .string()
      .trim()
      .min(1)
      .transform((s) => s.toUpperCase()),
    category: z.enum(SHARE_CATEGORIES),
    lastDividend: z.number().finite().nonnegative(),
    fixedDividendRate: z.number().min(0).max(1).optional(),
    parValue: z.number().finite().positive(),
  })
  .superRefine((params, ctx) => {
    if (params.category === 'Preferred' && params.fixedDividendRate === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fixedDividendRate'],
        message: 'Preferred 종목에는 고정 배당률이 필요합니다',
      });
    }
  });

/**
 * 체결 입력
 */
export const TradeInputSchema = z.object({
  quantity: z.number().int().positive(),
  action: z.enum(TRADE_ACTIONS),
  price: PriceSchema,
});

export type ParsedShareParams = z.infer<typeof ShareParamsSchema>;
export type TradeInput = z.infer<typeof TradeInputSchema>;

/**
 * 스키마 검증 후 실패 시 InvalidArgumentError
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, context: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidArgumentError(context, issues);
  }
  return result.data;
}
