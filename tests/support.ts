import pino from 'pino';
import type { ProviderFixture } from '../src/provider';

export const silentLogger = pino({ level: 'silent' });

export const PLAIN_USER = { identity: 'user-plain', secret: 'test-secret' };
export const OTP_USER = { identity: 'user-otp', secret: 'test-secret' };
export const OTP_CODE = '123456';

export function providerFixture(): ProviderFixture {
  return {
    accounts: [
      {
        ...PLAIN_USER,
        installations: [
          { id: 'inst-1', alias: 'Home', zones: {} },
          { id: 'inst-2', alias: 'Cabin', zones: { internal_day: true, external: true } }
        ]
      },
      {
        ...OTP_USER,
        otp: {
          code: OTP_CODE,
          phones: [
            { id: 1, phone: '600111222' },
            { id: 2, phone: '600333444' }
          ]
        },
        installations: [{ id: 'inst-9', alias: 'Office', disarm_code: '4321', zones: {} }]
      }
    ]
  };
}

export function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, resolve: () => release() };
}
