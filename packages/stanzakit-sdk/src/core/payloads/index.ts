export { DiscoInfo, DiscoItems, type DiscoIdentity, type DiscoItem } from './disco'
export { BindBind } from './bind'
export { ControlSet, ControlSetResponse, type ControlField, type ControlFieldType } from './iotControl'
