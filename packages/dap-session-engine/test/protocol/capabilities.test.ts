import { expect } from 'chai';
import {
  ADAPTER_CAPABILITY_KINDS,
  CLIENT_CAPABILITY_KINDS,
  CapabilitySet,
  capabilitySetFromObject,
} from '../../src/protocol/capabilities';

describe('capabilities', () => {
  describe('capabilitySetFromObject', () => {
    it('reads only boolean fields named by the enumeration', () => {
      const set = capabilitySetFromObject(
        {
          supportsConfigurationDoneRequest: true,
          supportsStepBack: false,
          supportsModulesRequest: 'yes',
          supportsSomethingElse: true,
        },
        ADAPTER_CAPABILITY_KINDS,
      );

      expect(set.contains('supportsConfigurationDoneRequest')).to.be.true;
      expect(set.contains('supportsStepBack')).to.be.false;
      expect(set.contains('supportsModulesRequest')).to.be.false;
      expect(set.toArray()).to.deep.equal(['supportsConfigurationDoneRequest']);
    });

    it('yields an empty set without a source object', () => {
      const set = capabilitySetFromObject(undefined, CLIENT_CAPABILITY_KINDS);

      expect(set.size).to.equal(0);
    });
  });

  describe('CapabilitySet', () => {
    it('lists present flags in enumeration order', () => {
      const set = new CapabilitySet(ADAPTER_CAPABILITY_KINDS);

      set.setPresent('supportsANSIStyling', true);
      set.setPresent('supportsStepBack', true);
      set.setPresent('supportsLogPoints', true);
      set.setPresent('supportsLogPoints', false);

      expect(set.toArray()).to.deep.equal([
        'supportsStepBack',
        'supportsANSIStyling',
      ]);
      expect(set.size).to.equal(2);
    });
  });
});
