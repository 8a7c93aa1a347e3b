import { ApiProperty } from '@nestjs/swagger';

export class InfinityPaginationResponseDto<T> {
  data!: T[];

  @ApiProperty({ type: Boolean, example: true })
  hasNextPage!: boolean;

  @ApiProperty({ type: Number, example: 42 })
  total!: number;
}
