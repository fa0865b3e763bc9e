import { Module } from "@nestjs/common";
import { IoModule } from "../io/io.module";
import { FragmentLoaderFactory } from "./fragments/fragment-loader.factory";
import { InventoryService } from "./inventory/inventory.service";

@Module({
  imports: [IoModule],
  providers: [FragmentLoaderFactory, InventoryService],
  exports: [FragmentLoaderFactory, InventoryService],
})
export class CoreModule {}
