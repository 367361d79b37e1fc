import { BadRequestException } from '@nestjs/common';

/** An ISO 8601 instant, or a 400 when `Date` cannot represent it. */
export function instantFrom(iso: string, field = 'now'): Date {
  const instant = new Date(iso);
  if (Number.isNaN(instant.getTime())) {
    throw new BadRequestException(`${field} is not a valid instant: "${iso}"`);
  }
  return instant;
}

/**
 * The one place the wall clock is read. Everything below the controllers
 * takes `now` as an argument.
 */
export function anchorFrom(iso?: string): Date {
  return iso ? instantFrom(iso) : new Date();
}
