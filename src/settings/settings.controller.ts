import { Body, Controller, Delete, Get, Param, Put } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import {
  MessageResponse,
  success,
  SuccessResponse,
} from "../common/dto/api-response.dto";
import { ValidationError } from "../common/errors/api-errors";
import { UpsertSettingDto } from "./dto/upsert-setting.dto";
import { UserSetting } from "./entities/user-setting.entity";
import { SettingsService } from "./settings.service";

const SETTING_KEY_PATTERN = /^[A-Za-z0-9_.-]{1,100}$/;

function assertValidKey(key: string): void {
  if (!SETTING_KEY_PATTERN.test(key)) {
    throw new ValidationError(
      "Setting keys are 1-100 characters of letters, digits, '_', '.' or '-'",
      { key },
    );
  }
}

@ApiTags("settings")
@Controller("settings")
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  /**
   * GET /v1/settings
   */
  @Get()
  @ApiOperation({ summary: "All settings, ordered by key" })
  async findAll(): Promise<SuccessResponse<UserSetting[]>> {
    return success(await this.settingsService.findAll());
  }

  /**
   * GET /v1/settings/:key
   */
  @Get(":key")
  @ApiOperation({ summary: "One setting" })
  @ApiResponse({ status: 404, description: "Setting not found" })
  async findOne(
    @Param("key") key: string,
  ): Promise<SuccessResponse<UserSetting>> {
    assertValidKey(key);
    return success(await this.settingsService.get(key));
  }

  /**
   * PUT /v1/settings/:key
   */
  @Put(":key")
  @ApiOperation({ summary: "Create or overwrite a setting" })
  async upsert(
    @Param("key") key: string,
    @Body() body: UpsertSettingDto,
  ): Promise<SuccessResponse<UserSetting>> {
    assertValidKey(key);
    return success(
      await this.settingsService.set(key, body.value),
      "Setting saved",
    );
  }

  /**
   * DELETE /v1/settings/:key
   */
  @Delete(":key")
  @ApiOperation({ summary: "Delete a setting" })
  @ApiResponse({ status: 404, description: "Setting not found" })
  async remove(@Param("key") key: string): Promise<MessageResponse> {
    assertValidKey(key);
    await this.settingsService.remove(key);
    return { status: "success", message: "Setting deleted" };
  }
}
