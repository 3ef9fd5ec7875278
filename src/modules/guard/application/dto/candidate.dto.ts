import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsOptional,
  IsString,
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from 'class-validator';

function isCoordinatePair(point: unknown): boolean {
  return (
    Array.isArray(point) &&
    point.length === 2 &&
    point.every((c: unknown) => typeof c === 'number' && Number.isFinite(c))
  );
}

/**
 * Checks for an array of [x, y] number pairs.
 */
function IsPointList(validationOptions?: ValidationOptions) {
  return ValidateBy(
    {
      name: 'isPointList',
      validator: {
        validate: (value: unknown) =>
          Array.isArray(value) && value.every(isCoordinatePair),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be a list of [x, y] number pairs`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export class SubmitCandidateDto {
  @ApiProperty({
    example: '3FA9C01B',
    description:
      'Text decoded from the presented code. Any string is accepted; invalid ones are rejected, not errors.',
  })
  @IsString()
  text!: string;

  @ApiPropertyOptional({
    example: [
      [12, 40],
      [212, 38],
      [214, 240],
      [10, 242],
    ],
    description: 'Corner points of the detected code, for display overlays',
  })
  @IsOptional()
  @IsPointList()
  points?: number[][];
}
