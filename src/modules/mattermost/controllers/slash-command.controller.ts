import {
  BadGatewayException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { ChatPlatformRequestError } from '../../../core/ports/chat-platform/chat-platform.errors';
import { SlashCommandTokenGuard } from '../auth/slash-command-token.guard';
import { type SlashCommandDto, slashCommandSchema } from '../dto/slash-command.dto';
import {
  type ISlashCommandResponse,
  type SlashCommandResult,
  SlashCommandResponseType,
} from '../entities/slash-command.interfaces';
import { SLASH_COMMAND_ROUTE } from '../mattermost.constants';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { WhenToChatCommandService } from '../services/when-to-chat-command.service';
import {
  SLASH_COMMAND_BODY_SCHEMA,
  SLASH_COMMAND_RESPONSE_SCHEMA,
} from '../swagger/slash-command.schemas';

@ApiTags('Mattermost')
@Controller(SLASH_COMMAND_ROUTE)
@UseGuards(SlashCommandTokenGuard)
export class SlashCommandController {
  public constructor(
    @Inject(WhenToChatCommandService)
    private readonly whenToChatCommandService: WhenToChatCommandService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Handle a Mattermost slash command invocation' })
  @ApiConsumes('application/x-www-form-urlencoded', 'application/json')
  @ApiBody({ schema: SLASH_COMMAND_BODY_SCHEMA })
  @ApiResponse({
    status: 200,
    description: 'Ephemeral reply for the invoking user',
    schema: SLASH_COMMAND_RESPONSE_SCHEMA,
  })
  @ApiResponse({ status: 401, description: 'Invalid slash command token' })
  @ApiResponse({ status: 502, description: 'Mattermost API request failed' })
  public async handleCommand(
    @Body(new ZodValidationPipe(slashCommandSchema, 'slash command payload'))
    body: SlashCommandDto,
  ): Promise<ISlashCommandResponse> {
    let result: SlashCommandResult;

    try {
      result = await this.whenToChatCommandService.execute({
        teamId: body.team_id,
        channelId: body.channel_id,
        userId: body.user_id,
        command: body.command,
        text: body.text,
      });
    } catch (error: unknown) {
      if (error instanceof ChatPlatformRequestError) {
        throw new BadGatewayException(`Mattermost request failed: ${error.operation}`, {
          cause: error,
        });
      }

      throw error;
    }

    if (result.message === null) {
      return {};
    }

    // Mattermost shows an ephemeral response to the invoking user only.
    return {
      response_type: SlashCommandResponseType.EPHEMERAL,
      text: result.message,
    };
  }
}
