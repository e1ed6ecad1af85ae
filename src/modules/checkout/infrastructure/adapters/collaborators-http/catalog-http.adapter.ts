import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CatalogPort, CatalogProduct } from '../../../application/ports/catalog.port';
import type { CollaboratorCallContext } from '../../../application/ports/collaborator-call-context';
import type { StepOutcome } from '../../../domain';
import { callCollaborator } from '../shared';
import { parseCatalogProduct } from './payload-parsers';

@Injectable()
export class CatalogHttpAdapter implements CatalogPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('CATALOG_SERVICE_URL') ?? 'http://localhost:8086';
    this.timeoutMs = this.configService.get<number>('CATALOG_TIMEOUT_MS') ?? 2000;
  }

  getPrice(productId: string, call: CollaboratorCallContext): Promise<StepOutcome<CatalogProduct>> {
    return callCollaborator({
      collaborator: 'catalog',
      baseUrl: this.baseUrl,
      method: 'GET',
      path: `/products/${encodeURIComponent(productId)}`,
      timeoutMs: this.timeoutMs,
      call,
      parse: parseCatalogProduct,
    });
  }
}
