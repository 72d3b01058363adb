import { Module } from '@nestjs/common';
import { Localizer } from './i18n/localizer';
import { ScreenRenderer } from './navigation/screens';

@Module({
  providers: [Localizer, ScreenRenderer],
  exports: [Localizer, ScreenRenderer],
})
export class BotUiModule {}
