import { ArgumentMetadata, BadRequestException, Injectable, ParseIntPipe, PipeTransform } from '@nestjs/common';

// Bounds of PostgreSQL INTEGER, the type of every serial id here
export const INT4_MIN = -2147483648;
export const INT4_MAX = 2147483647;

/** ParseIntPipe that also rejects ids the database could not store. */
@Injectable()
export class ParseIdPipe implements PipeTransform<string, Promise<number>> {
  private readonly parseIntPipe = new ParseIntPipe();

  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await this.parseIntPipe.transform(value, metadata);
    if (id < INT4_MIN || id > INT4_MAX) {
      throw new BadRequestException(`Validation failed (${metadata.data ?? 'id'} is out of range)`);
    }
    return id;
  }
}
