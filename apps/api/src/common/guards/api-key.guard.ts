import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AccessControlService } from '../../access-control/access-control.service';

export const API_KEY_HEADER = 'x-api-key';

interface HeaderCarrier {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

/**
 * Requires the shared stream key in the `x-api-key` header.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly accessControl: AccessControlService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<HeaderCarrier>();
    const header = request.headers[API_KEY_HEADER];

    if (header === undefined) {
      throw new UnauthorizedException(`Missing ${API_KEY_HEADER} header`);
    }

    const key = Array.isArray(header) ? header[0] : header;
    if (!(await this.accessControl.validateKey(key, request.ip))) {
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }
}
