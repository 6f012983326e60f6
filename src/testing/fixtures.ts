import type { FakeRegistry } from './fakeRegistry.js';

export const PROFILE_REF = 'https://ns.adobe.com/xdm/context/profile';
export const RECORD_REF = 'https://ns.adobe.com/xdm/data/record';

/** Stores the global profile class, based on the record behavior. */
export function seedProfile(registry: FakeRegistry) {
  registry.addGlobal('classes', {
    $id: PROFILE_REF,
    'meta:altId': '_xdm.context.profile',
    title: 'XDM Individual Profile',
    version: '1.4',
    'meta:extends': [RECORD_REF],
    allOf: [{ $ref: RECORD_REF }, { properties: { person: { type: 'object' } } }],
  });
}
