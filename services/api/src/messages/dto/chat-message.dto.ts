import {
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { MESSAGE, MsgType, OptionTarget, VALIDATION } from '@parley/shared';

/**
 * Incoming chat message.
 * Which payload fields are required depends on msgType.
 */
export class ChatMessageDto {
  @IsEnum(MsgType)
  msgType!: MsgType;

  @IsString()
  @Matches(VALIDATION.USERNAME, {
    message: 'Username must be 1-32 characters, alphanumeric and underscores only',
  })
  username!: string;

  @IsOptional()
  @IsISO8601()
  timestamp?: string;

  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.TEXT)
  @IsString()
  @MaxLength(MESSAGE.MAX_TEXT_LENGTH)
  text?: string;

  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.FILE)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  fileName?: string;

  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.FILE)
  @IsString()
  @MaxLength(MESSAGE.MAX_FILE_LENGTH)
  fileContents?: string;

  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.LOGIN)
  @IsString()
  password?: string;

  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.OPTION)
  @IsEnum(OptionTarget)
  target?: OptionTarget;

  /** Absent, null or empty for a query */
  @ValidateIf((o: ChatMessageDto) => o.msgType === MsgType.OPTION && o.value != null)
  @IsString()
  @MaxLength(MESSAGE.MAX_OPTION_LENGTH)
  value?: string | null;
}
