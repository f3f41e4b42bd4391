import type { MinistrySelection } from '../../models/volunteer.model';
import { InvalidRequestError } from '../../utils/app-error';
import { ErrorCodes, type ErrorCode } from '../../utils/error-codes';
import type { MinistryTaxonomy } from './taxonomy';

export type SelectionValidationResult =
  | { valid: true }
  | { valid: false; code: ErrorCode; error: string; index: number };

export class TaxonomyValidator {
  constructor(private readonly taxonomy: MinistryTaxonomy) {}

  /**
   * Check selections in order; the first bad one decides the result.
   * An empty list is valid.
   */
  validate(selections: readonly MinistrySelection[]): SelectionValidationResult {
    for (const [index, { category, area }] of selections.entries()) {
      const areas = this.taxonomy.areasOf(category);
      if (!areas) {
        return {
          valid: false,
          code: ErrorCodes.INVALID_CATEGORY,
          error: `Invalid category: ${category}`,
          index,
        };
      }
      if (!areas.includes(area)) {
        return {
          valid: false,
          code: ErrorCodes.INVALID_MINISTRY_AREA,
          error: `Invalid ministry area '${area}' for category '${category}'`,
          index,
        };
      }
    }

    return { valid: true };
  }

  /**
   * @throws InvalidRequestError naming the offending category or area
   */
  assertValid(selections: readonly MinistrySelection[]): void {
    const result = this.validate(selections);
    if (!result.valid) {
      throw new InvalidRequestError(result.error, result.code, { index: result.index });
    }
  }
}
