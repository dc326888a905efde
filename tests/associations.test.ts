import { describe, expect, it } from 'vitest';
import { StaticConfigurationStore } from '../src/services/associations';

describe('StaticConfigurationStore', () => {
  const store = new StaticConfigurationStore([
    { contentModel: 'islandora:sp_basic_image', datastreamId: 'OBJ', transform: 'exif' },
    { contentModel: 'islandora:sp_large_image_cmodel', datastreamId: 'MODS', transform: 'mods' },
    { contentModel: 'islandora:sp_basic_image', datastreamId: 'MODS', transform: 'mods' },
    { contentModel: 'islandora:sp_basic_image', datastreamId: 'OBJ', transform: 'exif' },
  ]);

  it('returns associations for each model in model order', async () => {
    const associations = await store.associationsFor([
      'islandora:sp_large_image_cmodel',
      'islandora:sp_basic_image',
    ]);

    expect(associations.map((a) => `${a.contentModel}/${a.datastreamId}`)).toEqual([
      'islandora:sp_large_image_cmodel/MODS',
      'islandora:sp_basic_image/OBJ',
      'islandora:sp_basic_image/MODS',
    ]);
  });

  it('drops duplicate associations', async () => {
    const associations = await store.associationsFor(['islandora:sp_basic_image']);

    expect(associations).toEqual([
      { contentModel: 'islandora:sp_basic_image', datastreamId: 'OBJ', transform: 'exif' },
      { contentModel: 'islandora:sp_basic_image', datastreamId: 'MODS', transform: 'mods' },
    ]);
  });

  it('counts a repeated model once', async () => {
    const associations = await store.associationsFor([
      'islandora:sp_large_image_cmodel',
      'islandora:sp_large_image_cmodel',
    ]);

    expect(associations).toHaveLength(1);
  });

  it('returns nothing for unknown models', async () => {
    expect(await store.associationsFor(['fedora-system:FedoraObject-3.0'])).toEqual([]);
  });
});
