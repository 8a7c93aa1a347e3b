import {
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Query,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { plainToClass } from 'class-transformer';
import { Request as ExpressRequest } from 'express';
import { ActivityQueryService } from './activity-query.service';
import { ListActivityQueryDto } from './dto/list-activity-query.dto';
import { ActivityEntryResponseDto } from './dto/activity-entry-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { extractActorFromRequest } from '../utils/actor-extractor.util';

@ApiTags('Activity')
@Controller({ path: 'documents/:documentId/activity', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class ActivityController {
  constructor(private readonly activityQueryService: ActivityQueryService) {}

  @Get()
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({
    summary: "List a document's activity, newest first",
    description: 'Requires ADMIN. The owner can still read it after deletion.',
  })
  @ApiOkResponse({ type: InfinityPaginationResponseDto })
  @ApiForbiddenResponse({ description: 'ADMIN access required' })
  @ApiNotFoundResponse({ description: 'Document not found' })
  async list(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Query() query: ListActivityQueryDto,
  ): Promise<InfinityPaginationResponseDto<ActivityEntryResponseDto>> {
    const { data, total, pagination } =
      await this.activityQueryService.listForDocument(
        documentId,
        extractActorFromRequest(req),
        query.page,
        query.limit,
      );

    return infinityPagination(
      data.map((entry) => {
        const dto = plainToClass(ActivityEntryResponseDto, entry, {
          excludeExtraneousValues: true,
        });
        // Untyped nested objects lose their keys under excludeExtraneousValues
        dto.details = entry.details;
        return dto;
      }),
      pagination,
      total,
    );
  }
}
