import { expect } from 'chai';
import { Refs } from '../../src/resource-manager/utils/refs';

describe('Refs.safeRef', () => {
  it('replaces characters that are not dns-safe', () => {
    expect(Refs.safeRef('web_asg')).to.equal('web-asg-jsgmsq0x');
    expect(Refs.safeRef('web-tier/web_lb')).to.equal('web-tier-web-lb-usu0k6om');
  });

  it('hashes the seed when one is given', () => {
    expect(Refs.safeRef('autoscaling_group', 'web_asg:0:1')).to.equal('autoscaling-group-k1n9pmua');
  });

  it('truncates to 63 characters', () => {
    const ref = Refs.safeRef('a'.repeat(70));
    expect(ref).to.equal(`${'a'.repeat(54)}-d1xstnql`);
    expect(ref.length).to.equal(63);
  });

  it('rejects a max length shorter than the hash', () => {
    expect(() => Refs.safeRef('web', undefined, 4)).to.throw('Max length cannot be less than hash length');
  });
});
