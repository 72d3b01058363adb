import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { loadAppConfig } from '../../config/app.config';
import { AdminOnlyGuard } from './admin-only.guard';

function contextWithHeaders(headers: Record<string, string>): ExecutionContextHost {
  const req = { header: (name: string) => headers[name.toLowerCase()] };
  return new ExecutionContextHost([req, {}, () => undefined]);
}

describe('AdminOnlyGuard', () => {
  const guard = new AdminOnlyGuard(loadAppConfig({ ADMIN_IDS: '900,901', ADMIN_API_TOKEN: 'test-admin-secret' }));

  it('admits requests carrying the admin token', () => {
    expect(guard.canActivate(contextWithHeaders({ 'x-admin-token': 'test-admin-secret' }))).toBe(true);
  });

  it('rejects a request that only names a known operator id', () => {
    expect(() => guard.canActivate(contextWithHeaders({ 'x-admin-id': '900' }))).toThrow(ForbiddenException);
  });

  it('rejects wrong tokens and missing headers', () => {
    expect(() => guard.canActivate(contextWithHeaders({ 'x-admin-token': 'test-admin-secreT' }))).toThrow(ForbiddenException);
    expect(() => guard.canActivate(contextWithHeaders({ 'x-admin-token': 'test' }))).toThrow(ForbiddenException);
    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(ForbiddenException);
  });

  it('refuses everyone while no token is configured', () => {
    const closed = new AdminOnlyGuard(loadAppConfig({ ADMIN_IDS: '900' }));

    expect(() => closed.canActivate(contextWithHeaders({ 'x-admin-token': '' }))).toThrow(ForbiddenException);
    expect(() => closed.canActivate(contextWithHeaders({ 'x-admin-id': '900' }))).toThrow(ForbiddenException);
  });
});
