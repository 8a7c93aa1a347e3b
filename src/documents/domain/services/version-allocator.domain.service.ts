import { Injectable } from '@nestjs/common';
import { TransactionScope } from '../../../database/unit-of-work';
import { DomainError } from '../../../utils/errors/domain-error';

/**
 * Hands out the next version number of a document.
 *
 * Must be called inside the transaction that inserts the version: the
 * document row lock taken here is held until that transaction ends, so
 * concurrent uploads on one document get distinct, contiguous numbers.
 * Never hold it across a blob upload.
 */
@Injectable()
export class VersionAllocatorDomainService {
  async nextVersionNumber(
    scope: TransactionScope,
    documentId: string,
  ): Promise<number> {
    const document = await scope.documents.findByIdForUpdate(documentId);
    if (!document) {
      throw DomainError.notFound('Document');
    }

    const current = await scope.versions.findMaxVersionNumber(documentId);
    return current + 1;
  }
}
