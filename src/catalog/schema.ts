/**
 * Policy Catalog Schema
 *
 * Shape and cross-field rules of the policy catalog configuration.
 */

import { z } from 'zod';
import { ActionTag, FatigueBand, Mode } from '../contracts/types';
import { FatigueBandZ, ModeZ } from '../contracts/schemas';

/** O-tests are short mechanical checks */
export const MAX_OTEST_SECONDS = 60;

export const OTestProcedureZ = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lowercase alphanumeric with _ -'),
    description: z.string().min(1),
    max_seconds: z.number().int().positive().max(MAX_OTEST_SECONDS),
  })
  .strict();

export const ClassifierThresholdsZ = z
  .object({
    rising_at: z.number().int().min(1),
    near_limit_at: z.number().int().min(2),
  })
  .strict();

const BandModeTableZ = z
  .object({
    [FatigueBand.OK]: ModeZ,
    [FatigueBand.RISING]: ModeZ,
    [FatigueBand.NEAR_LIMIT]: ModeZ,
  })
  .strict();

export const PolicyRuleZ = z
  .object({
    band: FatigueBandZ,
    modes: z.array(ModeZ).min(1).optional(),
    context_window: z.boolean().optional(),
    actions: z.array(z.nativeEnum(ActionTag)).min(1),
  })
  .strict();

export const ResetPolicyZ = z
  .object({
    short_minutes: z.number().positive(),
    long_minutes: z.number().positive(),
    long_after_resets: z.number().int().nonnegative(),
  })
  .strict();

export const PolicyCatalogZ = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, 'must be a semantic version'),
    otests: z.array(OTestProcedureZ).min(1),
    classifier: ClassifierThresholdsZ,
    band_modes: BandModeTableZ,
    next_session_modes: BandModeTableZ,
    rules: z.array(PolicyRuleZ),
    reset: ResetPolicyZ,
  })
  .strict()
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.otests.forEach((otest, i) => {
      if (seen.has(otest.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['otests', i, 'id'],
          message: `duplicate O-test id "${otest.id}"`,
        });
      }
      seen.add(otest.id);
    });

    if (catalog.classifier.near_limit_at <= catalog.classifier.rising_at) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['classifier', 'near_limit_at'],
        message: 'near_limit_at must be greater than rising_at',
      });
    }

    if (catalog.band_modes[FatigueBand.OK] === Mode.RED) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['band_modes', FatigueBand.OK],
        message: 'RED mode requires a fatigue band other than OK',
      });
    }

    if (catalog.reset.long_minutes < catalog.reset.short_minutes) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reset', 'long_minutes'],
        message: 'long_minutes must not be shorter than short_minutes',
      });
    }

    catalog.rules.forEach((rule, i) => {
      if (rule.band === FatigueBand.OK && rule.actions.includes(ActionTag.DOWNGRADE_MODE)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', i, 'actions'],
          message: 'DOWNGRADE_MODE is not allowed for band OK',
        });
      }
    });
  });

export type OTestProcedure = z.infer<typeof OTestProcedureZ>;
export type ClassifierThresholds = z.infer<typeof ClassifierThresholdsZ>;
export type PolicyRule = z.infer<typeof PolicyRuleZ>;
export type ResetPolicy = z.infer<typeof ResetPolicyZ>;
export type PolicyCatalogData = z.infer<typeof PolicyCatalogZ>;
