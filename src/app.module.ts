import { Module } from "@nestjs/common";
import { CliModule } from "./cli/cli.module";
import { ConfigModule } from "./config/config.module";
import { CoreModule } from "./core/core.module";
import { IoModule } from "./io/io.module";

@Module({
  imports: [ConfigModule, IoModule, CoreModule, CliModule],
})
export class AppModule {}
