/**
 * Model catalog tests
 */

import {
  ModelCatalog,
  buildInput,
  getModelCatalog,
  normalizeOptions,
  type ModelSpec,
} from '../../services/model-catalog.js';
import { ValidationError } from '../../utils/errors.js';

function requireModel(key: string): ModelSpec {
  const model = getModelCatalog().get(key);
  if (model === null) {
    throw new Error(`missing model ${key}`);
  }
  return model;
}

describe('ModelCatalog', () => {
  it('should load the bundled catalog', () => {
    const keys = getModelCatalog()
      .list()
      .map((model) => model.key);

    expect(keys).toEqual(['nano_banana', 'nano_banana_pro', 'nano_banana_edit']);
  });

  it('should return null for an unknown model', () => {
    expect(getModelCatalog().get('does_not_exist')).toBeNull();
  });

  it('should apply schema defaults to references and bundles', () => {
    const model = requireModel('nano_banana');

    expect(model.references.mode).toBe('none');
    expect(model.bundles).toEqual([]);
    expect(requireModel('nano_banana_edit').references.inputKey).toBe('image_urls');
  });

  it('should reject an empty catalog', () => {
    expect(() => ModelCatalog.fromJson({ models: [] })).toThrow(/^Invalid model catalog: models/);
  });

  it('should reject an option whose default is not one of its values', () => {
    const raw = {
      models: [
        {
          key: 'broken',
          provider: 'kie',
          providerModel: 'x/broken',
          modelType: 'image',
          displayName: 'Broken',
          options: [
            {
              key: 'size',
              label: 'Size',
              default: 'huge',
              values: [{ value: 'small', label: 'Small', priceKey: 'size_small' }],
            },
          ],
        },
      ],
    };

    expect(() => ModelCatalog.fromJson(raw)).toThrow(
      'Invalid model catalog: models.0.options.0: default must be one of the option values'
    );
  });
});

describe('normalizeOptions', () => {
  it('should fill defaults and replace values the model does not allow', () => {
    const model = requireModel('nano_banana_pro');

    const options = normalizeOptions(model, { resolution: '8K', output_format: 'jpg', extra: 'x' }, 0);

    expect(options).toEqual({
      output_format: 'jpg',
      aspect_ratio: '1:1',
      resolution: '1K',
      reference_images: 'none',
    });
  });

  it('should set the reference toggle from the number of references', () => {
    const model = requireModel('nano_banana_pro');

    expect(normalizeOptions(model, { reference_images: 'none' }, 2)['reference_images']).toBe('has');
    expect(normalizeOptions(model, { reference_images: 'has' }, 0)['reference_images']).toBe('none');
  });
});

describe('buildInput', () => {
  it('should leave out ui-only options and pass references under the model key', () => {
    const model = requireModel('nano_banana_pro');
    const options = normalizeOptions(model, { resolution: '2K' }, 1);

    const input = buildInput(model, 'a lighthouse at dusk', options, ['https://img.test/ref.png']);

    expect(input).toEqual({
      prompt: 'a lighthouse at dusk',
      output_format: 'png',
      aspect_ratio: '1:1',
      resolution: '2K',
      image_input: ['https://img.test/ref.png'],
    });
  });

  it('should drop references for a model that takes none', () => {
    const model = requireModel('nano_banana');
    const options = normalizeOptions(model, {}, 1);

    const input = buildInput(model, 'a fox', options, ['https://img.test/ref.png']);

    expect(input).toEqual({ prompt: 'a fox', output_format: 'png', image_size: '1:1' });
  });

  it('should refuse more references than the model accepts', () => {
    const model = requireModel('nano_banana_edit');
    const refs = Array.from({ length: 11 }, (_, i) => `https://img.test/${i}.png`);

    expect(() => buildInput(model, 'edit', normalizeOptions(model, {}, refs.length), refs)).toThrow(
      ValidationError
    );
  });
});
