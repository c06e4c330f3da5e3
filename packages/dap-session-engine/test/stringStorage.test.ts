import { expect } from 'chai';
import { deepClone } from '../src/marshal/marshaller';
import { threadSchema } from '../src/protocol/schemas';
import { StringStorage } from '../src/stringStorage';

describe('StringStorage', () => {
  let storage: StringStorage;

  beforeEach(() => {
    storage = new StringStorage();
  });

  it('stores each distinct string once', () => {
    const built = ['ma', 'in'].join('');

    expect(storage.getAndPut('main')).to.equal('main');
    expect(storage.getAndPut(built)).to.equal('main');
    expect(storage.getAndPut('worker')).to.equal('worker');

    expect(storage.size).to.equal(2);
    expect(storage.has('main')).to.be.true;
    expect(storage.has('other')).to.be.false;
  });

  it('interns every string of a cloned value', () => {
    deepClone(threadSchema, { id: 1, name: 'main' }, storage);
    deepClone(threadSchema, { id: 2, name: 'main' }, storage);

    expect(storage.size).to.equal(1);
  });
});
