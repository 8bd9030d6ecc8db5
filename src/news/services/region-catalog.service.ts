import { Inject, Injectable } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { Region } from '../types/news.types';

@Injectable()
export class RegionCatalogService {
  private readonly byCode = new Map<string, Region>();
  private readonly defaultRegion: Region;

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {
    for (const region of config.regions) {
      this.byCode.set(region.code.toLowerCase(), region);
    }
    const fallback =
      this.byCode.get(config.defaultRegionCode.toLowerCase()) ??
      config.regions[0];
    if (!fallback) {
      throw new Error('region catalog is empty');
    }
    this.defaultRegion = fallback;
  }

  list(): readonly Region[] {
    return this.config.regions;
  }

  /**
   * Code, then name, then a known name inside free-form location text
   * ("Taipei, Taiwan"). Anything else resolves to the default region.
   */
  resolve(input: string | null | undefined): Region {
    const needle = (input ?? '').trim().toLowerCase();
    if (!needle) {
      return this.defaultRegion;
    }

    const byCode = this.byCode.get(needle);
    if (byCode) {
      return byCode;
    }

    const regions = this.config.regions;
    const byName = regions.find((region) => region.name.toLowerCase() === needle);
    if (byName) {
      return byName;
    }

    const contained = regions.find((region) =>
      needle.includes(region.name.toLowerCase()),
    );
    return contained ?? this.defaultRegion;
  }
}
