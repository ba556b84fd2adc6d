export * from "./BaseStatement";
export * from "./IfGotoStatement";
export * from "./IfBlockStatement";
export * from "./DoStatement";
export * from "./ForStatement";
export * from "./PrintStatement";
export * from "./InputStatement";
export * from "./LetStatement";
export * from "./GotoStatement";
export * from "./StopStatement";
export * from "./ExitStatement";
export * from "./EmptyStatement";
