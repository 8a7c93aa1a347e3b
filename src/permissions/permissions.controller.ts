import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { PermissionsService } from './permissions.service';
import { GrantPermissionDto } from './dto/grant-permission.dto';
import { UpdatePermissionDto } from './dto/update-permission.dto';
import { PermissionResponseDto } from './dto/permission-response.dto';
import { extractActorFromRequest } from '../utils/actor-extractor.util';

/**
 * Sharing endpoints. Every mutation requires ADMIN on the document (the
 * owner always has it); listing requires READ.
 */
@ApiTags('Permissions')
@Controller({ path: 'documents/:documentId/permissions', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiParam({ name: 'documentId', type: String, format: 'uuid' })
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class PermissionsController {
  constructor(private readonly permissionsService: PermissionsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Share a document with a user' })
  @ApiCreatedResponse({ type: PermissionResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not ADMIN' })
  @ApiNotFoundResponse({ description: 'Document or target user not found' })
  @ApiConflictResponse({
    description: 'Self-share, owner as target, or permission already exists',
  })
  grant(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Body() dto: GrantPermissionDto,
  ): Promise<PermissionResponseDto> {
    return this.permissionsService.grant(
      documentId,
      dto,
      extractActorFromRequest(req),
    );
  }

  @Get()
  @ApiOperation({
    summary: 'List who can access a document',
    description:
      'The owner is listed first as an implicit ADMIN, followed by explicit grants, newest first.',
  })
  @ApiOkResponse({ type: PermissionResponseDto, isArray: true })
  list(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
  ): Promise<PermissionResponseDto[]> {
    return this.permissionsService.list(
      documentId,
      extractActorFromRequest(req),
    );
  }

  @Patch(':userId')
  @ApiOperation({ summary: "Change a user's role on a document" })
  @ApiOkResponse({ type: PermissionResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not ADMIN or target is owner' })
  @ApiNotFoundResponse({ description: 'No permission exists for the user' })
  updateRole(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Param('userId', ParseUUIDPipe) userId: string,
    @Body() dto: UpdatePermissionDto,
  ): Promise<PermissionResponseDto> {
    return this.permissionsService.updateRole(
      documentId,
      userId,
      dto,
      extractActorFromRequest(req),
    );
  }

  @Delete(':userId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Revoke a user's access to a document" })
  @ApiNoContentResponse({ description: 'Permission removed' })
  @ApiForbiddenResponse({ description: 'Caller is not ADMIN or target is owner' })
  @ApiNotFoundResponse({ description: 'No permission exists for the user' })
  revoke(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Param('userId', ParseUUIDPipe) userId: string,
  ): Promise<void> {
    return this.permissionsService.revoke(
      documentId,
      userId,
      extractActorFromRequest(req),
    );
  }
}
