import { z } from 'zod';

export const AUTH_MODES = ['ManagedIdentity', 'ServicePrincipal'] as const;
export const CONFLICT_STRATEGIES = ['NotifyOnly', 'AutoIncrement', 'Fail', 'SuffixRandom'] as const;

export type AuthMode = (typeof AUTH_MODES)[number];
export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

// Placeholder returned in place of secrets by the settings API
export const MASKED_SECRET = '********';

const ServicePrincipalSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  clientSecretVaultEntryName: z.string().min(1).optional(),
});

const SecretStoreSchema = z.object({
  vaultUri: z.string().url(),
  defaultEntryName: z.string().min(1),
});

const CacheSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  durationMinutes: z.number().int().positive().default(60),
});

export const ValidationSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    authMode: z.enum(AUTH_MODES).default('ManagedIdentity'),
    tenantId: z.string().min(1).optional(),
    subscriptionIds: z.array(z.string().min(1)).default([]),
    servicePrincipal: ServicePrincipalSchema.optional(),
    secretStore: SecretStoreSchema.optional(),
    cache: CacheSettingsSchema.default({}),
    conflictStrategy: z.enum(CONFLICT_STRATEGIES).default('NotifyOnly'),
    excludedResourceTypes: z.array(z.string().min(1)).default([]),
  })
  .superRefine((settings, ctx) => {
    if (settings.authMode !== 'ServicePrincipal') return;

    if (!settings.tenantId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tenantId'],
        message: 'tenantId is required for ServicePrincipal authentication',
      });
    }

    const sp = settings.servicePrincipal;
    if (!sp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['servicePrincipal'],
        message: 'servicePrincipal is required for ServicePrincipal authentication',
      });
      return;
    }

    // secretStore always names a default entry, so its presence is enough
    if (!settings.secretStore && !sp.clientSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['servicePrincipal', 'clientSecret'],
        message: 'a client secret or a secret store entry is required',
      });
    }
    if (sp.clientSecretVaultEntryName && !settings.secretStore) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['secretStore'],
        message: 'secretStore.vaultUri is required when a vault entry name is set',
      });
    }
  });

export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type ValidationSettingsInput = z.input<typeof ValidationSettingsSchema>;

export function defaultSettings(): ValidationSettings {
  return ValidationSettingsSchema.parse({});
}

/**
 * Copy of the settings safe to hand back to operators.
 */
export function maskSettings(settings: ValidationSettings): ValidationSettings {
  if (!settings.servicePrincipal?.clientSecret) {
    return settings;
  }
  return {
    ...settings,
    servicePrincipal: { ...settings.servicePrincipal, clientSecret: MASKED_SECRET },
  };
}
