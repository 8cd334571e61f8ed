import { z } from 'zod'

/**
 * System package names handed to the package manager
 */
const PackageNameSchema = z
  .string()
  .min(1, 'Package name cannot be empty')
  .refine((name) => !name.startsWith('-'), {
    message: 'Package name cannot start with "-"',
  })

/**
 * What to do when refreshing the package index fails
 */
export const RefreshPolicySchema = z.enum(['abort', 'continue'])

/**
 * Provisioner configuration
 */
export const ProvisionConfigSchema = z.object({
  /** System packages installed with the package manager */
  systemPackages: z
    .array(PackageNameSchema)
    .default(['wkhtmltopdf', 'chromium-browser', 'python3-pip']),

  /** Dependency manifest, one requirement per line */
  manifestPath: z.string().min(1).default('requirements.txt'),

  /** Script made executable, invoked later by the user */
  targetScript: z.string().min(1).default('url_to_pdf_agent.py'),

  /** Interpreter shown in the usage hint */
  interpreter: z.string().min(1).default('python3'),

  /** Argument placeholder shown in the usage hint */
  usageArgs: z.string().default('<input_file_or_directory>'),

  /** Command used to install manifest dependencies */
  pipCommand: z.string().min(1).default('pip3'),

  /** Run system package commands through sudo */
  sudo: z.boolean().default(true),

  refreshPolicy: RefreshPolicySchema.default('abort'),
})

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>
export type ProvisionConfigInput = z.input<typeof ProvisionConfigSchema>
export type RefreshPolicy = z.infer<typeof RefreshPolicySchema>

export const defaultConfig: ProvisionConfig = ProvisionConfigSchema.parse({})
