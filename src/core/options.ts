/**
 * Conversion option value objects.
 *
 * Callers build options once per job with {@link createRenderingOptions} or
 * {@link createReconstructionOptions} and pass them into every entry point.
 * The returned objects are frozen; no component reads defaults on its own.
 *
 * @module core/options
 */
import { z } from 'zod';
import { OptionsError } from './errors.js';

export const PAGE_SIZES = ['A4', 'A5', 'Letter', 'Legal'] as const;

export type PageSizeName = (typeof PAGE_SIZES)[number];

/** Page widths in millimetres; the narrower side of each size. */
const PAGE_WIDTHS_MM: Record<PageSizeName, number> = {
  A4: 210,
  A5: 148,
  Letter: 215.9,
  Legal: 215.9,
};

const renderingOptionsSchema = z
  .object({
    /** Page margins on all four sides, in millimetres. */
    margins: z.number().min(0).max(100).default(20),
    /** Body font size in points. */
    baseFontSize: z.number().positive().max(72).default(11),
    mainFont: z.string().min(1).default('Arial'),
    monoFont: z.string().min(1).default('Courier'),
    pageSize: z.enum(PAGE_SIZES).default('A4'),
    colorLinks: z.boolean().default(true),
    toc: z.boolean().default(true),
    highlight: z.boolean().default(true),
  })
  .superRefine((options, ctx) => {
    const width = PAGE_WIDTHS_MM[options.pageSize];
    if (options.margins * 2 >= width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['margins'],
        message: `Margins must total less than the ${width} mm width of ${options.pageSize}`,
      });
    }
  });

const reconstructionOptionsSchema = z.object({
  /** Added to every reconstructed heading level before clamping to 1..6. */
  headerLevelAdjust: z.number().int().min(-5).max(5).default(1),
  addFrontmatter: z.boolean().default(true),
  cleanupEnabled: z.boolean().default(true),
});

/** Options consumed by the page renderer. */
export type RenderingOptions = Readonly<z.output<typeof renderingOptionsSchema>>;

/** Options consumed by the text reconstructor. */
export type ReconstructionOptions = Readonly<z.output<typeof reconstructionOptionsSchema>>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Build validated rendering options.
 *
 * Missing fields take the documented defaults (20 mm margins, 11 pt,
 * Arial / Courier, A4, coloured links, TOC and code highlighting on).
 *
 * @throws {OptionsError} When a field is out of range or of the wrong type.
 *
 * @example
 * ```ts
 * const options = createRenderingOptions({ toc: false, pageSize: 'Letter' });
 * ```
 */
export function createRenderingOptions(
  overrides: Partial<RenderingOptions> = {},
): RenderingOptions {
  const result = renderingOptionsSchema.safeParse(overrides);
  if (!result.success) {
    throw new OptionsError('Invalid rendering options', formatIssues(result.error));
  }
  return Object.freeze(result.data);
}

/**
 * Build validated reconstruction options.
 *
 * Defaults: headings shifted one level deeper, frontmatter added, cleanup on.
 *
 * @throws {OptionsError} When a field is out of range or of the wrong type.
 */
export function createReconstructionOptions(
  overrides: Partial<ReconstructionOptions> = {},
): ReconstructionOptions {
  const result = reconstructionOptionsSchema.safeParse(overrides);
  if (!result.success) {
    throw new OptionsError('Invalid reconstruction options', formatIssues(result.error));
  }
  return Object.freeze(result.data);
}
