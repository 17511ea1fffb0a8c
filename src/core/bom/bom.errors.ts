export abstract class BomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnresolvedReferenceError extends BomError {
  constructor(
    readonly partNumber: string,
    readonly parentPartNumber?: string,
    message = parentPartNumber
      ? `Part '${partNumber}' referenced by '${parentPartNumber}' is neither a catalog part nor a known assembly.`
      : `Assembly '${partNumber}' was not found.`,
  ) {
    super(message);
  }
}

/** A leaf part number that the catalog does not contain. */
export class UnknownPartError extends UnresolvedReferenceError {
  constructor(partNumber: string, parentPartNumber?: string) {
    super(
      partNumber,
      parentPartNumber,
      parentPartNumber
        ? `Unable to find part '${partNumber}' referenced by '${parentPartNumber}'.`
        : `Unable to find part '${partNumber}'.`,
    );
  }
}

export class DuplicatePartError extends BomError {
  constructor(
    readonly partNumber: string,
    source = 'catalog',
  ) {
    super(`Part number '${partNumber}' appears more than once in the ${source}.`);
  }
}

export class CyclicBomError extends BomError {
  constructor(readonly cycle: string[]) {
    super(`BOM contains a cycle: ${cycle.join(' -> ')}.`);
  }
}

export class NotDirectChildError extends BomError {
  constructor(
    readonly partNumber: string,
    readonly assemblyPartNumber: string,
  ) {
    super(
      `Part '${partNumber}' is not a direct child of '${assemblyPartNumber}'.`,
    );
  }
}

export class InvalidRecordError extends BomError {
  constructor(
    message: string,
    readonly details: Record<string, string | number> = {},
  ) {
    super(message);
  }
}

export class RootResolutionError extends BomError {
  constructor(readonly candidates: string[]) {
    super(
      candidates.length === 0
        ? 'No root BOM found.'
        : `Singular root BOM not found. Candidates: ${candidates.join(', ')}.`,
    );
  }
}
