import { Module } from "@nestjs/common";
import { ConfigService } from "./config.service";
import {
  RUNTIME_CONTEXT,
  createProcessRuntimeContext,
} from "./runtime-context";

@Module({
  providers: [
    {
      provide: RUNTIME_CONTEXT,
      useFactory: () => createProcessRuntimeContext(),
    },
    ConfigService,
  ],
  exports: [ConfigService, RUNTIME_CONTEXT],
})
export class ConfigModule {}
