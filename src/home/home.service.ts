import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface AppInfo {
  name: string;
  description: string;
}

@Injectable()
export class HomeService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  appInfo(): AppInfo {
    return {
      name: this.configService.getOrThrow('app.name', { infer: true }),
      description:
        'Extracts hospital admission and clinical summaries from clinical notes',
    };
  }
}
