import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { getGlobalDispatcher, ProxyAgent } from 'undici';
import { HTTP_DISPATCHER } from './wikidata.constants';
import { WikidataHttpClient } from './wikidata-http.client';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: HTTP_DISPATCHER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const proxyUrl =
          configService.get<string>('HTTPS_PROXY') ??
          configService.get<string>('http_proxy');
        return proxyUrl ? new ProxyAgent(proxyUrl) : getGlobalDispatcher();
      },
    },
    WikidataHttpClient,
  ],
  exports: [WikidataHttpClient],
})
export class WikidataModule {}
