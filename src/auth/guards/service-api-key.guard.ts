import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { AllConfigType } from '../../config/config.type';

/**
 * Service API Key Guard
 *
 * Extraction endpoints are service-to-service only. Callers send
 * `Authorization: Bearer <AUTH_SERVICE_API_KEY>`. Without a configured key
 * every request is rejected.
 *
 * Never log the key value.
 */
@Injectable()
export class ServiceApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ServiceApiKeyGuard.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid service API key');
    }

    const expectedKey = this.configService.get('auth.serviceApiKey', {
      infer: true,
    });
    if (!expectedKey) {
      this.logger.error('AUTH_SERVICE_API_KEY is not configured');
      throw new UnauthorizedException('Invalid service API key');
    }

    const providedKey = authHeader.substring(7); // Remove 'Bearer '
    if (!this.keysMatch(providedKey, expectedKey)) {
      throw new UnauthorizedException('Invalid service API key');
    }

    return true;
  }

  // Compare digests so length differences do not short-circuit
  private keysMatch(provided: string, expected: string): boolean {
    const providedDigest = createHash('sha256').update(provided).digest();
    const expectedDigest = createHash('sha256').update(expected).digest();
    return timingSafeEqual(providedDigest, expectedDigest);
  }
}
