import { type PipeTransform, BadRequestException } from '@nestjs/common';
import { type z } from 'zod';

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  public constructor(
    private readonly schema: z.ZodType<T>,
    private readonly payloadLabel: string = 'payload',
  ) {}

  public transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      const formatted: string = result.error.issues
        .map((issue) => {
          const fieldPath: string = issue.path.map(String).join('.');

          return `${fieldPath.length > 0 ? fieldPath : '(root)'}: ${issue.message}`;
        })
        .join('; ');
      throw new BadRequestException(`Invalid ${this.payloadLabel}: ${formatted}`);
    }

    return result.data;
  }
}
