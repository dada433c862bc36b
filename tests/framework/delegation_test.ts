/**
 * Delegation Tests
 *
 * Member resolution helpers, delegating decorators and explicit delegation.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Decorator } from '../../framework/decorator/decorator.ts';
import {
  definesMember,
  describeReceiver,
  forwardCall,
  invokeMember,
  isPrivateMember,
  lookupPublicMember,
} from '../../framework/decorator/delegation.ts';
import { NoMethodError } from '../../framework/decorator/errors.ts';
import { Relation } from '../../framework/orm/relation.ts';
import {
  Maker,
  Product,
  ProductDecorator,
  Widget,
  WidgetDecorator,
  buildProduct,
  useFixtureRegistry,
} from '../fixtures/models.ts';

useFixtureRegistry();

interface ListingDecorator extends Pick<Product, 'title' | 'hello'> {}

class ListingDecorator extends Decorator {
  declare readonly source: Product;
}
ListingDecorator.delegate('title', 'hello');

class CreditDecorator extends Decorator {
  declare readonly source: Product;

  get maker(): Maker | null {
    return this.source.maker;
  }
}
CreditDecorator.delegate('name', { to: 'maker' });

class NotedDecorator extends Decorator {
  note = 'noted';
}
NotedDecorator.delegateAll();

function isNoMethod(member: string, receiver: string) {
  return (error: unknown) =>
    error instanceof NoMethodError &&
    error.member === member &&
    error.message === `undefined method '${member}' for ${receiver}`;
}

// Helpers

test('isPrivateMember - underscore names are private', () => {
  assert.equal(isPrivateMember('_secret'), true);
  assert.equal(isPrivateMember('secret'), false);
});

test('lookupPublicMember - finds own and inherited public members', () => {
  const product = buildProduct();

  assert.deepEqual(lookupPublicMember(product, 'title'), { found: true, value: 'Lamp' });
  assert.equal(lookupPublicMember(product, 'hello').found, true);
  assert.deepEqual(lookupPublicMember(product, '_secret'), { found: false });
  assert.deepEqual(lookupPublicMember(product, 'missing'), { found: false });
  assert.deepEqual(lookupPublicMember(null, 'title'), { found: false });
  assert.deepEqual(lookupPublicMember('text', 'length'), { found: false });
});

test('definesMember - stops at the given prototype', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.equal(definesMember(decorated, 'displayTitle'), true);
  assert.equal(definesMember(decorated, 'toJSON'), true);
  assert.equal(definesMember(decorated, 'toJSON', Decorator.prototype), false);
  assert.equal(definesMember(decorated, 'title'), false);
});

test('forwardCall - calls the member on the target', () => {
  const product = buildProduct();

  assert.equal(forwardCall(product, 'hello', ['Ada'], 'a product'), 'Hello, Ada, from Lamp');
  assert.throws(() => forwardCall(product, 'title', [], 'a product'), isNoMethod('title', 'a product'));
});

test('invokeMember - reads values and calls methods', () => {
  const product = buildProduct();

  assert.equal(invokeMember(product, 'title'), 'Lamp');
  assert.equal(invokeMember(product, 'hello', ['Ada']), 'Hello, Ada, from Lamp');
  assert.equal(invokeMember(product, 'missing'), undefined);
});

test('describeReceiver - names classes and instances', () => {
  const [anonymous] = [() => 1];

  assert.equal(describeReceiver(Product), 'class Product');
  assert.equal(describeReceiver(anonymous), 'anonymous class');
  assert.equal(describeReceiver(buildProduct()), 'an instance of Product');
  assert.equal(describeReceiver(Object.create(null)), 'an object');
  assert.equal(describeReceiver(42), 'number');
});

// Delegating decorators

test('delegateAll - forwards reads to the source', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.equal(decorated.title, 'Lamp');
  assert.equal(decorated.hello('Ada'), 'Hello, Ada, from Lamp');
  assert.equal(decorated.mapTitle((title) => title.toLowerCase()), 'lamp');
  assert.equal(decorated.summary(), 'Lamp (25)');
});

test('delegateAll - reuses the forwarder for each method', () => {
  const decorated = ProductDecorator.decorate(buildProduct());
  assert.equal(decorated.hello, decorated.hello);
});

test('delegateAll - members of the decorator win', () => {
  const decorated = ProductDecorator.decorate(buildProduct({ price: 24.6 }));

  assert.equal(decorated.price, 25);
  assert.equal(decorated.source.price, 24.6);
  assert.equal(decorated.displayTitle, 'LAMP');
});

test('delegateAll - missing and private members raise NoMethodError', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.throws(
    () => Reflect.get(decorated, 'nonexistent'),
    isNoMethod('nonexistent', 'an instance of ProductDecorator')
  );
  assert.throws(() => Reflect.get(decorated, '_secret'), isNoMethod('_secret', 'an instance of ProductDecorator'));
});

test('delegateAll - writes go through to the source', () => {
  const product = buildProduct();
  const decorated = ProductDecorator.decorate(product);

  decorated.title = 'Desk';

  assert.equal(product.title, 'Desk');
  assert.equal(decorated.title, 'Desk');
});

test('delegateAll - the in operator sees delegated members', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.equal('title' in decorated, true);
  assert.equal('displayTitle' in decorated, true);
  assert.equal('nonexistent' in decorated, false);
  assert.equal('_secret' in decorated, false);
  assert.equal('_internal' in decorated, false);
  assert.equal(decorated.respondTo('_internal'), false);
  assert.equal('summary' in decorated, true);
});

test('delegateAll - decorators are not thenables', async () => {
  const decorated = ProductDecorator.decorate(buildProduct());
  assert.equal(await decorated, decorated);
});

test('delegateAll - subclass fields live on the decorator', () => {
  const decorated = NotedDecorator.decorate({ note: 'from source', size: 3 });

  assert.equal(decorated.note, 'noted');
  assert.equal(Reflect.get(decorated, 'size'), 3);
});

test('Decorator.respondTo - covers own and delegated members', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.equal(decorated.respondTo('title'), true);
  assert.equal(decorated.respondTo('displayTitle'), true);
  assert.equal(decorated.respondTo('nonexistent'), false);
  assert.equal(decorated.respondTo('_secret'), false);
  assert.equal(decorated.respondTo('_internal'), false);
  assert.equal(decorated.respondTo('_internal', true), true);
});

test('Decorator.invoke - calls own and delegated members by name', () => {
  const decorated = ProductDecorator.decorate(buildProduct());

  assert.equal(decorated.invoke('hello', 'Ada'), 'Hello, Ada, from Lamp');
  assert.equal(decorated.invoke('displayTitle'), 'LAMP');
  assert.throws(() => decorated.invoke('nope'), isNoMethod('nope', 'an instance of ProductDecorator'));
});

// Decorators without delegation

test('Decorator - does not delegate unless asked to', () => {
  const decorated = WidgetDecorator.decorate(new Widget({ label: 'w' }));

  assert.equal(decorated.label, '[w]');
  assert.equal(Reflect.get(decorated, 'attribute'), undefined);
  assert.equal(decorated.respondTo('label'), true);
  assert.equal(decorated.respondTo('attribute'), false);
  assert.throws(() => decorated.invoke('attribute', 'label'), isNoMethod('attribute', 'an instance of WidgetDecorator'));
});

// Explicit delegation

test('Decorator.delegate - forwards only the named members', () => {
  const product = buildProduct();
  const decorated = ListingDecorator.decorate(product);

  assert.equal(decorated.title, 'Lamp');
  assert.equal(decorated.hello('Ada'), 'Hello, Ada, from Lamp');
  assert.equal(decorated.respondTo('title'), true);
  assert.equal(decorated.respondTo('price'), false);
  assert.equal(Reflect.get(decorated, 'price'), undefined);

  decorated.title = 'Desk';
  assert.equal(product.title, 'Desk');
});

test('Decorator.delegate - forwards to another member with to', () => {
  const product = buildProduct();
  const decorated = CreditDecorator.decorate(product);

  assert.throws(() => Reflect.get(decorated, 'name'), isNoMethod('name', 'null'));

  product.maker = new Maker({ name: 'Acme' });
  assert.equal(Reflect.get(decorated, 'name'), 'Acme');
});

// Class-level delegation

test('Decorator.respondTo - delegating classes answer for the source class', () => {
  assert.equal(ProductDecorator.respondTo('featured'), true);
  assert.equal(ProductDecorator.respondTo('decorateCollection'), true);
  assert.equal(ProductDecorator.respondTo('missing'), false);
  assert.equal(WidgetDecorator.respondTo('all'), false);
});

test('Decorator.invoke - calls class members and source class members', () => {
  Product.deleteAll();
  const featured = buildProduct({ featured: true });
  buildProduct();

  const relation = ProductDecorator.invoke('featured');
  assert.ok(relation instanceof Relation);
  assert.deepEqual(relation.toArray(), [featured]);
  assert.equal(ProductDecorator.invoke('collectionDecoratorClass'), ProductDecorator.collectionDecoratorClass());

  assert.throws(() => ProductDecorator.invoke('nope'), isNoMethod('nope', 'class ProductDecorator'));
  assert.throws(() => WidgetDecorator.invoke('all'), isNoMethod('all', 'class WidgetDecorator'));
});
