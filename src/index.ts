export { ModalSubmitInteraction, ModalSubmitInteractionFields, UserResolution, resolveUser } from './models/ModalSubmitInteraction';
export { ModalSubmitInteractionData } from './models/ModalSubmitInteractionData';
export { ActionRow, ActionRowComponent } from './models/component/ActionRow';
export { Button } from './models/component/Button';
export { InputText } from './models/component/InputText';
export { SelectMenu } from './models/component/SelectMenu';
export { Attachment } from './models/Attachment';
export { Embed } from './models/Embed';
export { Member, encodeMember } from './models/Member';
export { Message } from './models/Message';
export { PermissionFlags, PermissionName, Permissions } from './models/Permissions';
export { User, getUserDisplayName } from './models/User';
export * from './utils/snowflake';

export { CreateInteractionResponse } from './builders/CreateInteractionResponse';
export { CreateInteractionResponseData } from './builders/CreateInteractionResponseData';
export { CreateInteractionResponseFollowup } from './builders/CreateInteractionResponseFollowup';
export { EditInteractionResponse } from './builders/EditInteractionResponse';

export { Http } from './http/Http';
export { AxiosHttp, AxiosHttpOptions } from './http/AxiosHttp';
export { AllowedMentions, InteractionResponsePayload, MessagePayload } from './http/types';

export { ComponentType, InputTextStyle } from './enums/ComponentType';
export { InteractionResponseType } from './enums/InteractionResponseType';
export { DecodeErrorKind, DecodeException } from './exceptions/DecodeException';
export { HttpException } from './exceptions/HttpException';
export { JsonException } from './exceptions/JsonException';
export { ModelErrorKind, ModelException } from './exceptions/ModelException';
export { Result } from './result/Result';
export { DiscordErrorCode, MessageFlags, ReturnCode } from './constants';
export { AppConfig, config, loadConfig } from './config';
