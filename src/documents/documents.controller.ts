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
  Query,
  Request,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBearerAuth,
  ApiBody,
  ApiConsumes,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiServiceUnavailableResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { DocumentsService } from './documents.service';
import { CreateDocumentDto } from './dto/create-document.dto';
import { UpdateDocumentDto } from './dto/update-document.dto';
import { ListDocumentsQueryDto } from './dto/list-documents-query.dto';
import { DownloadQueryDto } from './dto/download-query.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { DocumentVersionResponseDto } from './dto/document-version-response.dto';
import { DownloadResponseDto } from './dto/download-response.dto';
import { IncomingFile } from './domain/utils/file-classifier.util';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { extractActorFromRequest } from '../utils/actor-extractor.util';
import { DomainError } from '../utils/errors/domain-error';

const UPLOAD_BODY_SCHEMA = {
  type: 'object',
  properties: {
    file: { type: 'string', format: 'binary' },
    title: { type: 'string', maxLength: 500 },
    description: { type: 'string' },
    tags: { type: 'string', description: 'Comma-separated tags' },
  },
  required: ['file', 'title'],
};

function toIncomingFile(file: Express.Multer.File | undefined): IncomingFile {
  if (!file) {
    throw DomainError.invalidInput('File is required');
  }
  return {
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    buffer: file.buffer,
  };
}

/**
 * Documents Controller
 *
 * All endpoints require a valid access token. Missing and soft-deleted
 * documents answer 404; an insufficient role answers 403.
 */
@ApiTags('Documents')
@Controller({ path: 'documents', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 20, ttl: 60000 } })
  @UseInterceptors(FileInterceptor('file'))
  @ApiOperation({ summary: 'Upload a new document (creates version 1)' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({ schema: UPLOAD_BODY_SCHEMA })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  @ApiUnprocessableEntityResponse({
    description: 'Empty, oversized or disallowed file',
  })
  @ApiServiceUnavailableResponse({ description: 'Blob store unavailable' })
  create(
    @Request() req: ExpressRequest,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: CreateDocumentDto,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.create(
      extractActorFromRequest(req),
      dto,
      toIncomingFile(file),
    );
  }

  @Get()
  @ApiOperation({
    summary: 'List accessible documents',
    description:
      'Documents the caller owns or has been shared, newest first. Soft-deleted documents are never listed.',
  })
  @ApiOkResponse({ type: InfinityPaginationResponseDto })
  findAll(
    @Request() req: ExpressRequest,
    @Query() query: ListDocumentsQueryDto,
  ): Promise<InfinityPaginationResponseDto<DocumentResponseDto>> {
    return this.documentsService.findAll(extractActorFromRequest(req), query);
  }

  @Get(':documentId')
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({ summary: 'Get document metadata and current version' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  @ApiForbiddenResponse({ description: 'No access to the document' })
  findOne(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.findOne(
      documentId,
      extractActorFromRequest(req),
    );
  }

  @Patch(':documentId')
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({ summary: 'Update title, description or tags (EDIT)' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  @ApiForbiddenResponse({ description: 'EDIT access required' })
  update(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Body() dto: UpdateDocumentDto,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.update(
      documentId,
      extractActorFromRequest(req),
      dto,
    );
  }

  @Delete(':documentId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({
    summary: 'Soft-delete a document (ADMIN)',
    description: 'Versions and stored content are kept.',
  })
  @ApiNoContentResponse({ description: 'Document deleted' })
  @ApiNotFoundResponse({ description: 'Document not found or already deleted' })
  @ApiForbiddenResponse({ description: 'ADMIN access required' })
  remove(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
  ): Promise<void> {
    return this.documentsService.remove(
      documentId,
      extractActorFromRequest(req),
    );
  }

  @Post(':documentId/versions')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 20, ttl: 60000 } })
  @UseInterceptors(FileInterceptor('file'))
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({ summary: 'Upload a new version (EDIT)' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: { file: { type: 'string', format: 'binary' } },
      required: ['file'],
    },
  })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  @ApiUnprocessableEntityResponse({
    description: 'File type differs from the document file type',
  })
  uploadVersion(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.uploadVersion(
      documentId,
      extractActorFromRequest(req),
      toIncomingFile(file),
    );
  }

  @Get(':documentId/versions')
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({ summary: 'List versions, newest first' })
  @ApiOkResponse({ type: DocumentVersionResponseDto, isArray: true })
  listVersions(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
  ): Promise<DocumentVersionResponseDto[]> {
    return this.documentsService.listVersions(
      documentId,
      extractActorFromRequest(req),
    );
  }

  @Get(':documentId/download')
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOperation({
    summary: 'Get a presigned download URL',
    description: 'Current version unless `version` is given.',
  })
  @ApiOkResponse({ type: DownloadResponseDto })
  @ApiNotFoundResponse({ description: 'Document or version not found' })
  @ApiServiceUnavailableResponse({ description: 'Blob store unavailable' })
  download(
    @Request() req: ExpressRequest,
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Query() query: DownloadQueryDto,
  ): Promise<DownloadResponseDto> {
    return this.documentsService.download(
      documentId,
      extractActorFromRequest(req),
      query.version,
    );
  }
}
