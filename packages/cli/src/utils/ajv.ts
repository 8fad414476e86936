// pattern: Functional Core
import _Ajv from "ajv";
import _addErrors from "ajv-errors";
import _addFormats from "ajv-formats";

// The three packages are CommonJS; their default export hangs off module.exports
const Ajv = _Ajv.default;
const addErrors = _addErrors.default;
const addFormats = _addFormats.default;

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  // Allow custom keywords
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

// Add format validation support
addFormats(ajv, ["uri", "uri-template"]);

// Add enhanced error messages
addErrors(ajv);

export { ajv };
