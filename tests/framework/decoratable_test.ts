/**
 * Decoratable Tests
 *
 * Sources that know their decorator.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Decoratable } from '../../framework/decorator/decoratable.ts';
import { Decorator } from '../../framework/decorator/decorator.ts';
import { UninferrableDecoratorError } from '../../framework/decorator/errors.ts';
import { isDecoratable } from '../../framework/decorator/types.ts';
import {
  AdminProduct,
  AdminProductDecorator,
  Product,
  ProductDecorator,
  ProductsDecorator,
  SpecificProductDecorator,
  Widget,
  WidgetDecorator,
  buildProduct,
  useFixtureRegistry,
} from '../fixtures/models.ts';

const registry = useFixtureRegistry();

class Clearance extends Product {}

class Listing extends Decoratable {
  static override modelName = 'Product';
}

class Sticker extends Decoratable {}

test('Decoratable.decoratorClass - appends the suffix to the class name', () => {
  assert.equal(Product.decoratorClass(), ProductDecorator);
  assert.equal(Widget.decoratorClass(), WidgetDecorator);
  assert.equal(AdminProduct.decoratorClass(), AdminProductDecorator);
  assert.equal(buildProduct().decoratorClass(), ProductDecorator);
});

test('Decoratable.decoratorClass - modelName overrides the class name', () => {
  assert.equal(Listing.decoratorClass(), ProductDecorator);
  assert.equal(new Listing().decoratorClass(), ProductDecorator);
});

test('Decoratable.decoratorClass - falls back to ancestors', () => {
  assert.equal(Clearance.decoratorClass(), ProductDecorator);
  assert.ok(new Clearance({ title: 'Lamp' }).decorate() instanceof ProductDecorator);
});

test('Decoratable.decoratorClass - names the class it was called on', () => {
  assert.throws(
    () => Sticker.decoratorClass(),
    (error: unknown) =>
      error instanceof UninferrableDecoratorError &&
      error.sourceClass === Sticker &&
      error.message === 'Could not infer a decorator for Sticker.'
  );
  assert.throws(() => new Sticker().decorate(), UninferrableDecoratorError);
});

test('Decoratable.decorate - decorates with the inferred decorator', () => {
  const product = buildProduct();
  const decorated = product.decorate({ context: { role: 'admin' } });

  assert.ok(decorated instanceof ProductDecorator);
  assert.equal(decorated.source, product);
  assert.deepEqual(decorated.context, { role: 'admin' });
});

test('Decoratable - reports itself as undecorated', () => {
  const product = buildProduct();

  assert.equal(product.isDecorated(), false);
  assert.deepEqual(product.appliedDecorators(), []);
  assert.equal(product.decoratedWith(ProductDecorator), false);
  assert.equal(isDecoratable(product), true);
  assert.equal(isDecoratable({ decoratorClass: () => ProductDecorator }), false);
});

test('Decoratable.equals - sees through decorator chains', () => {
  const product = buildProduct();
  const chain = SpecificProductDecorator.decorate(ProductDecorator.decorate(product));

  assert.equal(product.equals(product), true);
  assert.equal(product.equals(chain), true);
  assert.equal(product.equals(ProductDecorator.decorate(buildProduct())), false);
  assert.equal(product.equals(buildProduct()), false);
  assert.equal(product.equals(null), false);
});

test('Decoratable - decorators pass instanceof checks for their source class', () => {
  const product = buildProduct();
  const decorated = ProductDecorator.decorate(product);
  const chain = SpecificProductDecorator.decorate(decorated);

  assert.ok(decorated instanceof Product);
  assert.ok(chain instanceof Product);
  assert.ok(chain instanceof Decoratable);
  assert.equal(decorated instanceof AdminProduct, false);
  assert.equal(WidgetDecorator.decorate(new Widget({ label: 'w' })) instanceof Product, false);
});

test('Decoratable - collection decorators do not pass instanceof checks', () => {
  const collection = ProductsDecorator.decorate([buildProduct()]);
  assert.equal(collection instanceof Product, false);
});

test('Decoratable.decoratorClass - reads the current registry', () => {
  class Poster extends Decoratable {}
  class PosterDecorator extends Decorator {}

  assert.throws(() => Poster.decoratorClass(), UninferrableDecoratorError);

  registry.register(Poster, PosterDecorator);
  assert.equal(Poster.decoratorClass(), PosterDecorator);
  assert.equal(new Poster().decorate().constructor, PosterDecorator);
});
