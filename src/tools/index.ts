import type { Logger } from "pino";
import type { ToolTable } from "./ToolTypes";
import { ToolRegistry } from "./ToolRegistry";
import { ToolDispatcher } from "./ToolDispatcher";
import { ValidateAdapter, type Credentials } from "./adapters/Validate";
import { CountTextAdapter } from "./adapters/CountText";
import { ConvertCaseAdapter } from "./adapters/ConvertCase";
import { CleanTextAdapter } from "./adapters/CleanText";
import { Base64ConverterAdapter } from "./adapters/Base64Converter";
import { GeneratePasswordAdapter } from "./adapters/GeneratePassword";
import { ExtractDataAdapter } from "./adapters/ExtractData";

export function createToolTable(credentials: Credentials): ToolTable {
  return {
    validate: new ValidateAdapter(credentials),
    count_text: new CountTextAdapter(),
    convert_case: new ConvertCaseAdapter(),
    clean_text: new CleanTextAdapter(),
    base64_converter: new Base64ConverterAdapter(),
    generate_password: new GeneratePasswordAdapter(),
    extract_data: new ExtractDataAdapter(),
  };
}

export function createToolRegistry(credentials: Credentials): ToolRegistry {
  return ToolRegistry.fromTable(createToolTable(credentials));
}

export function createDispatcher(credentials: Credentials, logger: Logger): ToolDispatcher {
  return new ToolDispatcher(createToolRegistry(credentials), logger);
}
