import { SecurityContext } from './SecurityContext';
import { decodeSecurityToken, encodeSecurityToken } from './TokenCodec';

describe('SecurityContext', () => {
  it('signs a token for explicit claims', () => {
    const context = SecurityContext.builder()
      .userId('user-1')
      .roles(['developer'])
      .permissions(['AGENT_READ'])
      .serviceId('pos-catalog')
      .serviceType('backend')
      .build();

    expect(context.jwtToken).not.toBe('');
    expect(decodeSecurityToken(context.jwtToken)).toEqual({
      userId: 'user-1',
      roles: ['DEVELOPER'],
      permissions: ['AGENT_READ'],
      serviceId: 'pos-catalog',
      serviceType: 'backend',
    });
  });

  it('drops unknown roles and permissions', () => {
    const context = SecurityContext.builder()
      .roles(['ADMIN', 'wizard'])
      .permissions(['AGENT_READ', 'FLY'])
      .build();

    expect(context.getRoles()).toEqual(['ADMIN']);
    expect(context.getPermissions()).toEqual(['AGENT_READ']);
  });

  it('back-fills claims from a verified token and keeps it unchanged', () => {
    const token = encodeSecurityToken({
      userId: 'user-2',
      roles: ['ARCHITECT'],
      permissions: ['AGENT_READ'],
      serviceId: 'pos-events',
      serviceType: 'backend',
    });

    const context = SecurityContext.fromToken(token);

    expect(context.jwtToken).toBe(token);
    expect(context.userId).toBe('user-2');
    expect(context.getRoles()).toEqual(['ARCHITECT']);
    expect(context.serviceId).toBe('pos-events');
  });

  it('re-signs when explicit claims override a verified token', () => {
    const token = encodeSecurityToken({
      userId: 'user-2',
      roles: ['ARCHITECT'],
      permissions: ['AGENT_READ'],
      serviceId: 'pos-events',
      serviceType: 'backend',
    });

    const context = SecurityContext.builder().jwtToken(token).serviceId('pos-order').build();

    expect(context.jwtToken).not.toBe(token);
    expect(decodeSecurityToken(context.jwtToken)).toEqual({
      userId: 'user-2',
      roles: ['ARCHITECT'],
      permissions: ['AGENT_READ'],
      serviceId: 'pos-order',
      serviceType: 'backend',
    });
  });

  it('keeps an unverifiable token verbatim', () => {
    const context = SecurityContext.builder().jwtToken('invalid-token').userId('user-3').build();

    expect(context.jwtToken).toBe('invalid-token');
    expect(context.userId).toBe('user-3');
    expect(context.getRoles()).toEqual([]);
  });

  it('produces an empty token when nothing is given', () => {
    expect(SecurityContext.builder().build().jwtToken).toBe('');
    expect(SecurityContext.builder().jwtToken('  ').build().jwtToken).toBe('  ');
  });

  it('checks roles and permissions case-insensitively', () => {
    const context = SecurityContext.builder().roles(['ADMIN']).permissions(['AGENT_READ']).build();

    expect(context.hasRole('admin')).toBe(true);
    expect(context.hasPermission('agent_read')).toBe(true);
    expect(context.hasRole('DEVELOPER')).toBe(false);
  });

  it('returns copies of roles', () => {
    const context = SecurityContext.builder().roles(['ADMIN']).build();
    context.getRoles().push('USER');

    expect(context.getRoles()).toEqual(['ADMIN']);
  });
});
